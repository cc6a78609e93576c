/**
 * Configuration tree model: value types, helpers and errors.
 *
 * @packageDocumentation
 */

export type {
  ConfigScalar,
  ConfigTree,
  ConfigValue,
  MergeDiagnostic,
  MergeResult,
} from './types.js';
export { PLACEHOLDER_PATTERN, REGISTRY_KEY_PREFIX } from './types.js';
export {
  cloneTree,
  cloneValue,
  configEquals,
  formatPath,
  fromJson,
  getAtPath,
  getEntry,
  isConfigTree,
  isPlaceholder,
  isRegistryReference,
  placeholderPath,
  registryIdentity,
  setEntry,
} from './values.js';
export {
  ConfigError,
  ConfigOverrideError,
  ConfigParseError,
  ConfigSerializeError,
  InterpolationCycleError,
  UnresolvedReferenceError,
} from './errors.js';
