/**
 * Core value model for configuration trees.
 *
 * A configuration is a tree of sections. Every section maps string keys to
 * values drawn from a closed union: null, booleans, finite numbers, strings,
 * lists and nested sections.
 *
 * @packageDocumentation
 */

/**
 * A single configuration value.
 *
 * Integers and floats share the JavaScript number type. A string whose whole
 * content is `${dotted.path}` is a placeholder (see {@link isPlaceholder}).
 */
export type ConfigValue = null | boolean | number | string | ConfigValue[] | ConfigTree;

/**
 * One section of a configuration: a mapping from key to value.
 */
export interface ConfigTree {
  [key: string]: ConfigValue;
}

/**
 * Scalar members of the value union.
 */
export type ConfigScalar = null | boolean | number | string;

/**
 * Matches a whole placeholder string and captures its dotted path.
 *
 * Path segments are non-empty and contain no dots, braces or whitespace.
 */
export const PLACEHOLDER_PATTERN = /^\$\{([^\s.{}]+(?:\.[^\s.{}]+)*)\}$/;

/**
 * Prefix that marks a key as naming a registered function.
 */
export const REGISTRY_KEY_PREFIX = '@';

/**
 * Description of one piece of data a merge discarded.
 */
export type MergeDiagnostic =
  | {
      /** Both sides named different registered functions; the base block was dropped. */
      readonly kind: 'registry-replaced';
      readonly path: readonly string[];
      /** `@` keys and their values in the discarded base block. */
      readonly baseIdentity: Readonly<Record<string, ConfigValue>>;
      /** `@` keys and their values in the override block that replaced it. */
      readonly overrideIdentity: Readonly<Record<string, ConfigValue>>;
    }
  | {
      /** The base held a placeholder, so the override value was ignored. */
      readonly kind: 'placeholder-kept';
      readonly path: readonly string[];
      readonly placeholder: string;
      readonly ignored: ConfigValue;
    }
  | {
      /** A section met a non-section value; the override side won. */
      readonly kind: 'section-replaced';
      readonly path: readonly string[];
      readonly base: ConfigValue;
      readonly override: ConfigValue;
    };

/**
 * A merged tree together with everything the merge discarded.
 */
export interface MergeResult {
  readonly tree: ConfigTree;
  readonly diagnostics: readonly MergeDiagnostic[];
}
