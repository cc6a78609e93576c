/**
 * Turns command outcomes into exit codes and error output.
 */

import { CliUsageError } from '../args.js';
import type { CliCommandResult } from '../types.js';

/**
 * Hint printed after usage errors and unknown commands.
 */
export const USAGE_HINT = 'Run "cfgtree help" for usage information.';

/**
 * Prints a command failure to stderr as `Error: <message>`. Usage errors are
 * followed by {@link USAGE_HINT}.
 *
 * @param error - What the command threw.
 * @returns The exit code to use.
 */
export function reportCommandError(error: unknown): number {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof CliUsageError) {
    console.error(`\n${USAGE_HINT}`);
  }
  return 1;
}

/**
 * Runs a command and resolves to its exit code without exiting.
 *
 * @param fn - The command to run (sync or async).
 * @returns The command's exit code, or 1 after reporting a failure.
 */
export async function runCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>
): Promise<number> {
  try {
    const result = await fn();
    return result.exitCode;
  } catch (error) {
    return reportCommandError(error);
  }
}

/**
 * Runs a command and exits the process with its exit code.
 *
 * @param fn - The command to run (sync or async).
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>): void {
  void runCommand(fn).then((exitCode) => {
    process.exit(exitCode);
  });
}
