/**
 * Default settings used when cfgtree.toml is missing or incomplete.
 *
 * @packageDocumentation
 */

import type { LoggingSettings, RenderSettings, Settings } from './types.js';

/**
 * Name of the settings file looked up in the working directory.
 */
export const SETTINGS_FILE_NAME = 'cfgtree.toml';

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  interpolate: false,
  section_order: [],
};

export const DEFAULT_LOGGING_SETTINGS: LoggingSettings = {
  level: 'warn',
};

/**
 * Complete default settings.
 */
export const DEFAULT_SETTINGS: Settings = {
  render: DEFAULT_RENDER_SETTINGS,
  logging: DEFAULT_LOGGING_SETTINGS,
};
