import chalk from "chalk";

const prefix = chalk.bold("[elapsed]");

export const log = {
  info: (msg: string) => console.log(`${prefix} ${msg}`),
  success: (msg: string) => console.log(`${prefix} ${chalk.green("✓")} ${msg}`),
  warn: (msg: string) => console.log(`${prefix} ${chalk.yellow("⚠")} ${msg}`),
  error: (msg: string) => console.error(`${prefix} ${chalk.red("✗")} ${msg}`),
  dim: (msg: string) => console.log(`${prefix} ${chalk.dim(msg)}`),
  timing: (label: string, msg: string) =>
    console.log(`${prefix} ${chalk.cyan(`[${label}]`)} ${msg}`),
};

export type LogChannel = Exclude<keyof typeof log, "timing">;

/** Adapt a log channel into a string reporter for the pretty timing calls. */
export function logReporter(channel: LogChannel = "info"): (msg: string) => void {
  return (msg) => log[channel](msg);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
