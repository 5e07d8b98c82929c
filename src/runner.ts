import { spawn } from "node:child_process";
import ora from "ora";
import { timer as defaultTimer } from "./timer.js";
import type { PrettyReporter, Timer } from "./timer.js";
import { errorMessage } from "./utils/logger.js";

export interface RunTimedOptions {
  /** Message template for the report; `%s` receives the elapsed time */
  template: string;
  report: PrettyReporter;
  timer?: Timer;
  cwd?: string;
}

function display(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

function spawnInherited(
  command: string,
  args: string[],
  cwd: string | undefined,
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: "inherit" });

    child.once("error", (err) => {
      reject(new Error(`Failed to start ${command}: ${err.message}`));
    });
    child.once("close", (code: number | null) => {
      // Killed by a signal
      resolve(code ?? 1);
    });
  });
}

/**
 * Run a command to completion, timing it from spawn until it exits, and
 * resolve with its exit code. The child shares this process's stdio.
 */
export async function runTimed(
  command: string,
  args: string[],
  options: RunTimedOptions,
): Promise<number> {
  const timer = options.timer ?? defaultTimer;
  // Not animated: the child writes to the same terminal
  const spinner = ora({
    text: `${display(command, args)} — running...`,
    prefixText: "  ",
    isEnabled: false,
  }).start();

  try {
    const exitCode = await timer.timeFuturePrettyFormat(
      options.template,
      options.report,
      () => spawnInherited(command, args, options.cwd),
    );
    if (exitCode === 0) {
      spinner.succeed(`${display(command, args)} — exited 0`);
    } else {
      spinner.fail(`${display(command, args)} — exited ${exitCode}`);
    }
    return exitCode;
  } catch (err) {
    spinner.fail(`${display(command, args)} — failed: ${errorMessage(err)}`);
    throw err;
  }
}
