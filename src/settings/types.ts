/**
 * Settings types for cfgtree.toml.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Defaults for rendering configuration files from the CLI.
 */
export interface RenderSettings {
  /** Resolve placeholders before printing or writing. */
  interpolate: boolean;
  /** Top-level sections to render first. */
  section_order: string[];
}

/**
 * Logging settings.
 */
export interface LoggingSettings {
  /** Minimum level written to stderr. */
  level: LogLevel;
}

/**
 * Complete settings object parsed from cfgtree.toml.
 */
export interface Settings {
  render: RenderSettings;
  logging: LoggingSettings;
}

/**
 * Partial settings for merging over defaults.
 */
export interface PartialSettings {
  render?: Partial<RenderSettings>;
  logging?: Partial<LoggingSettings>;
}
