/**
 * Settings for the cfgtree CLI, read from cfgtree.toml and CFGTREE_*
 * environment variables.
 *
 * Override precedence: command-line flags > env > settings file > defaults
 *
 * @packageDocumentation
 */

export { parseSettings, SettingsParseError } from './parser.js';
export { applyEnvOverrides, EnvCoercionError, readEnvOverrides } from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { loadSettings } from './loader.js';
export type { LoadSettingsOptions } from './loader.js';
export {
  DEFAULT_LOGGING_SETTINGS,
  DEFAULT_RENDER_SETTINGS,
  DEFAULT_SETTINGS,
  SETTINGS_FILE_NAME,
} from './defaults.js';
export type {
  LoggingSettings,
  PartialSettings,
  RenderSettings,
  Settings,
} from './types.js';
