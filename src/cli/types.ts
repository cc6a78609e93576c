/**
 * CLI types and interfaces for the cfgtree CLI.
 */

import type { Settings } from '../settings/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Arguments following the command name.
   */
  args: string[];

  /**
   * Effective settings (cfgtree.toml and environment).
   */
  settings: Settings;

  /**
   * Logger writing JSON lines to stderr.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
