/**
 * Environment variable overrides for settings.
 *
 * Override precedence: env > settings file > defaults
 *
 * @packageDocumentation
 */

import { isLogLevel, LOG_LEVELS } from '../utils/logger.js';
import type { PartialSettings, Settings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    super(message ?? `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean. Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value is not a recognized boolean word.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.includes(normalized)) {
    return true;
  }
  if (FALSY.includes(normalized)) {
    return false;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

/**
 * Splits a comma-separated list, dropping empty items.
 */
function coerceToList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial settings with values from environment variables. */
  overrides: PartialSettings;
  /** Environment variables that were applied. */
  appliedVars: string[];
}

/**
 * Reads CFGTREE_* environment variables.
 *
 * - `CFGTREE_INTERPOLATE`: boolean
 * - `CFGTREE_SECTION_ORDER`: comma-separated section names
 * - `CFGTREE_LOG_LEVEL`: debug, info, warn or error
 *
 * Empty variables are ignored.
 *
 * @param env - The environment to read from.
 * @returns The overrides and the variables that produced them.
 * @throws EnvCoercionError if a variable holds an invalid value.
 */
export function readEnvOverrides(env: EnvRecord = process.env): EnvOverrideResult {
  const overrides: PartialSettings = {};
  const appliedVars: string[] = [];

  const interpolate = env.CFGTREE_INTERPOLATE;
  if (interpolate !== undefined && interpolate !== '') {
    overrides.render = {
      ...overrides.render,
      interpolate: coerceToBoolean(interpolate, 'CFGTREE_INTERPOLATE'),
    };
    appliedVars.push('CFGTREE_INTERPOLATE');
  }

  const sectionOrder = env.CFGTREE_SECTION_ORDER;
  if (sectionOrder !== undefined && sectionOrder !== '') {
    overrides.render = { ...overrides.render, section_order: coerceToList(sectionOrder) };
    appliedVars.push('CFGTREE_SECTION_ORDER');
  }

  const level = env.CFGTREE_LOG_LEVEL;
  if (level !== undefined && level !== '') {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new EnvCoercionError(
        'CFGTREE_LOG_LEVEL',
        level,
        'log level',
        `Cannot coerce 'CFGTREE_LOG_LEVEL' value '${level}' to a log level. Expected one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    overrides.logging = { level: normalized };
    appliedVars.push('CFGTREE_LOG_LEVEL');
  }

  return { overrides, appliedVars };
}

/**
 * Applies environment variable overrides to settings.
 *
 * @param settings - The settings to override.
 * @param env - The environment to read from.
 * @returns New settings with the overrides applied.
 * @throws EnvCoercionError if a variable holds an invalid value.
 */
export function applyEnvOverrides(settings: Settings, env: EnvRecord = process.env): Settings {
  const { overrides } = readEnvOverrides(env);
  return {
    render: { ...settings.render, ...overrides.render },
    logging: { ...settings.logging, ...overrides.logging },
  };
}
