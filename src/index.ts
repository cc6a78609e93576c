/**
 * cfgtree
 *
 * Sectioned configuration files with `${...}` references, typed values,
 * layered merging and a registry for functions named by configuration blocks.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

// Value model, helpers and errors
export {
  cloneTree,
  cloneValue,
  configEquals,
  ConfigError,
  ConfigOverrideError,
  ConfigParseError,
  ConfigSerializeError,
  formatPath,
  getAtPath,
  InterpolationCycleError,
  isConfigTree,
  isPlaceholder,
  isRegistryReference,
  PLACEHOLDER_PATTERN,
  REGISTRY_KEY_PREFIX,
  registryIdentity,
  UnresolvedReferenceError,
  type ConfigScalar,
  type ConfigTree,
  type ConfigValue,
  type MergeDiagnostic,
  type MergeResult,
} from './tree/index.js';

// Text to tree
export {
  applyOverrides,
  coerceValue,
  parse,
  parseStructure,
  type ConfigOverrides,
  type ParseOptions,
} from './parser/index.js';

// Tree transformations
export { interpolate, isInterpolated } from './interpolate/index.js';
export { merge, mergeWithDiagnostics } from './merge/index.js';

// Tree to text and bytes
export { fromBytes, render, toBytes, type RenderOptions } from './serialize/index.js';

// Documents and files
export {
  Config,
  fromDisk,
  toDisk,
  type ConfigLoadOptions,
  type DiskOptions,
} from './document/index.js';

// Function registry
export {
  findRegistryReferences,
  Registry,
  RegistryError,
  RegistryStore,
  type RegistryEntry,
  type RegistryReference,
} from './registry/index.js';

export { Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
