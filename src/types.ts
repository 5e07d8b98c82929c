import { z } from "zod";

// ─── Config File ─────────────────────────────────────────────────────────────

export const DEFAULT_TEMPLATE = "%s";

export const ConfigFileSchema = z.object({
  template: z
    .string()
    .default(DEFAULT_TEMPLATE)
    .describe("Message template; the elapsed time replaces its %s"),
  label: z
    .string()
    .min(1)
    .optional()
    .describe("Label shown in front of CLI timing lines"),
});

export type ElapsedConfig = z.infer<typeof ConfigFileSchema>;

// ─── CLI Input ───────────────────────────────────────────────────────────────

export const DURATION_UNITS = ["ns", "us", "ms"] as const;
export type DurationUnit = (typeof DURATION_UNITS)[number];

export const DurationUnitSchema = z.enum(DURATION_UNITS);

/** Nanoseconds in one of each input unit */
export const UNIT_NANOS: Record<DurationUnit, bigint> = {
  ns: 1n,
  us: 1_000n,
  ms: 1_000_000n,
};
