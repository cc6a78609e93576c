/**
 * TOML parser for cfgtree.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import { DEFAULT_LOGGING_SETTINGS, DEFAULT_RENDER_SETTINGS } from './defaults.js';
import type { LoggingSettings, RenderSettings, Settings } from './types.js';

/**
 * Error class for settings parsing errors.
 */
export class SettingsParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new SettingsParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SettingsParseError';
    this.cause = cause;
  }
}

type RawTable = Record<string, unknown>;

function isTable(value: unknown): value is RawTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an optional sub-table.
 *
 * @throws SettingsParseError if the key holds something other than a table.
 */
function readTable(raw: RawTable, key: string): RawTable | undefined {
  // eslint-disable-next-line security/detect-object-injection -- key is a fixed section name
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (!isTable(value)) {
    throw new SettingsParseError(`Invalid type for '${key}': expected table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws SettingsParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns A copy of the validated array.
 * @throws SettingsParseError if value is not an array of strings.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new SettingsParseError(
      `Invalid type for '${fieldPath}': expected array of strings, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new SettingsParseError(
        `Invalid type for '${fieldPath}[${String(index)}]': expected string, got ${typeof item}`
      );
    }
    return item;
  });
}

/**
 * Validates that a value names a log level.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated level.
 * @throws SettingsParseError if value is not one of the log levels.
 */
function validateLogLevel(value: unknown, fieldPath: string): LogLevel {
  if (typeof value !== 'string' || !isLogLevel(value)) {
    throw new SettingsParseError(
      `Invalid value for '${fieldPath}': expected one of ${LOG_LEVELS.join(', ')}, got ${String(value)}`
    );
  }
  return value;
}

function parseRenderSettings(raw: RawTable | undefined): RenderSettings {
  const result: RenderSettings = {
    ...DEFAULT_RENDER_SETTINGS,
    section_order: [...DEFAULT_RENDER_SETTINGS.section_order],
  };
  if (raw === undefined) {
    return result;
  }

  if ('interpolate' in raw) {
    result.interpolate = validateBoolean(raw.interpolate, 'render.interpolate');
  }
  if ('section_order' in raw) {
    result.section_order = validateStringArray(raw.section_order, 'render.section_order');
  }

  return result;
}

function parseLoggingSettings(raw: RawTable | undefined): LoggingSettings {
  const result: LoggingSettings = { ...DEFAULT_LOGGING_SETTINGS };
  if (raw === undefined) {
    return result;
  }

  if ('level' in raw) {
    result.level = validateLogLevel(raw.level, 'logging.level');
  }

  return result;
}

/**
 * Parses a TOML string into validated settings.
 *
 * @param tomlContent - Raw TOML content.
 * @returns Settings with defaults applied for missing fields.
 * @throws SettingsParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const settings = parseSettings(`
 * [render]
 * section_order = ["paths", "training"]
 * `);
 * console.log(settings.render.section_order); // ["paths", "training"]
 * ```
 */
export function parseSettings(tomlContent: string): Settings {
  let parsed: RawTable;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new SettingsParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    render: parseRenderSettings(readTable(parsed, 'render')),
    logging: parseLoggingSettings(readTable(parsed, 'logging')),
  };
}
