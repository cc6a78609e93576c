/**
 * CLI application context for cfgtree.
 */

import { loadSettings, type LoadSettingsOptions } from '../settings/index.js';
import { Logger } from '../utils/logger.js';
import type { CliContext } from './types.js';

/**
 * Creates the context shared by every command: settings from cfgtree.toml
 * and the environment, and a logger at the configured level.
 *
 * @param args - Arguments following the command name.
 * @param options - Where to look for settings.
 * @returns A promise resolving to the CLI context.
 * @throws SettingsParseError if cfgtree.toml is invalid.
 */
export async function createCliApp(
  args: readonly string[],
  options: LoadSettingsOptions = {}
): Promise<CliContext> {
  const settings = await loadSettings(options);
  const logger = new Logger({ component: 'cfgtree', level: settings.logging.level });
  logger.debug('settings_loaded', {
    interpolate: settings.render.interpolate,
    sectionOrder: settings.render.section_order,
  });
  return { args: [...args], settings, logger };
}
