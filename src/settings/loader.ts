/**
 * Loads settings for the CLI.
 *
 * Precedence: env > cfgtree.toml > defaults
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { safeReadTextIfExists } from '../utils/safe-fs.js';
import { SETTINGS_FILE_NAME } from './defaults.js';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { parseSettings } from './parser.js';
import type { Settings } from './types.js';

/**
 * Options for {@link loadSettings}.
 */
export interface LoadSettingsOptions {
  /** Directory searched for cfgtree.toml. Defaults to the working directory. */
  readonly cwd?: string | undefined;
  /** Environment to read overrides from. Defaults to process.env. */
  readonly env?: EnvRecord | undefined;
}

/**
 * Reads cfgtree.toml (if present) and applies environment overrides.
 *
 * @param options - Directory and environment to read.
 * @returns The effective settings.
 * @throws SettingsParseError if cfgtree.toml is invalid.
 * @throws EnvCoercionError if an environment override is invalid.
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {
  const cwd = options.cwd ?? process.cwd();
  const text = await safeReadTextIfExists(path.join(cwd, SETTINGS_FILE_NAME));
  // An empty document yields the defaults.
  return applyEnvOverrides(parseSettings(text ?? ''), options.env ?? process.env);
}
