import { Command } from "commander";
import { loadConfig } from "./config.js";
import { formatTemplate } from "./format.js";
import { pretty } from "./pretty.js";
import { runTimed } from "./runner.js";
import { DurationUnitSchema, UNIT_NANOS } from "./types.js";
import type { DurationUnit } from "./types.js";
import { errorMessage, log } from "./utils/logger.js";

const INTEGER = /^\d+$/;

/** Parse a non-negative integer duration in `unit` into nanoseconds */
export function parseDuration(input: string, unit: DurationUnit): bigint {
  const trimmed = input.replace(/_/g, "").trim();
  if (!INTEGER.test(trimmed)) {
    throw new Error(`Not a non-negative integer duration: ${input}`);
  }
  return BigInt(trimmed) * UNIT_NANOS[unit];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("elapsed")
    .description("Measure and pretty-print elapsed durations")
    .version("0.1.0")
    .enablePositionalOptions();

  program
    .command("pretty")
    .description("Print durations in human-readable form")
    .argument("<durations...>", "Integer durations (nanoseconds by default)")
    .option("-u, --unit <unit>", "Unit of the input durations: ns, us or ms", "ns")
    .action((durations: string[], opts: { unit: string }) => {
      try {
        const unit = DurationUnitSchema.parse(opts.unit);
        for (const input of durations) {
          console.log(pretty(parseDuration(input, unit)));
        }
      } catch (err) {
        log.error(errorMessage(err));
        process.exitCode = 1;
      }
    });

  program
    .command("exec")
    .description("Run a command and report how long it took")
    .argument("<command>", "Command to run")
    .argument("[args...]", "Arguments for the command")
    .option("-t, --template <fmt>", "Message template; %s receives the elapsed time")
    .option("-c, --config <path>", "Path to elapsed.yaml config file")
    .passThroughOptions()
    .action(
      async (
        command: string,
        args: string[],
        opts: { template?: string; config?: string },
      ) => {
        try {
          const config = loadConfig(opts.config);
          const template = opts.template ?? config.template;
          const label = config.label ?? command;
          // Reject a bad template before the command runs
          formatTemplate(template, "");

          let message: string | undefined;
          const exitCode = await runTimed(command, args, {
            template,
            report: (msg) => {
              message = msg;
            },
          });

          if (message !== undefined) log.timing(label, message);
          process.exitCode = exitCode;
        } catch (err) {
          log.error(errorMessage(err));
          process.exitCode = 1;
        }
      },
    );

  return program;
}
