/**
 * Helpers for inspecting, copying and comparing configuration values.
 *
 * Trees are plain objects. Keys are written with `Object.defineProperty` and
 * read through own-property checks, so keys such as `__proto__` or `toString`
 * behave like any other setting.
 *
 * @packageDocumentation
 */

import {
  PLACEHOLDER_PATTERN,
  REGISTRY_KEY_PREFIX,
  type ConfigTree,
  type ConfigValue,
} from './types.js';

/**
 * Checks whether a value is a nested section.
 *
 * @param value - The value to check.
 * @returns True for sections, false for scalars and lists.
 */
export function isConfigTree(value: ConfigValue): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Checks whether a value is a placeholder string such as `${training.dropout}`.
 *
 * @param value - The value to check.
 * @returns True if the whole value is a placeholder.
 */
export function isPlaceholder(value: ConfigValue): boolean {
  return typeof value === 'string' && PLACEHOLDER_PATTERN.test(value);
}

/**
 * Extracts the dotted path a placeholder refers to.
 *
 * @param value - A string value.
 * @returns The dotted path, or undefined if the value is not a placeholder.
 */
export function placeholderPath(value: string): string | undefined {
  const match = PLACEHOLDER_PATTERN.exec(value);
  return match?.[1];
}

/**
 * Reads an own key of a section.
 *
 * @param tree - The section to read.
 * @param key - The key to look up.
 * @returns The value, or undefined if the section has no such key.
 */
export function getEntry(tree: ConfigTree, key: string): ConfigValue | undefined {
  if (!Object.prototype.hasOwnProperty.call(tree, key)) {
    return undefined;
  }
  // eslint-disable-next-line security/detect-object-injection -- own property checked above
  return tree[key];
}

/**
 * Writes a key of a section as an ordinary own property.
 *
 * @param tree - The section to write into.
 * @param key - The key to set.
 * @param value - The value to store.
 */
export function setEntry(tree: ConfigTree, key: string, value: ConfigValue): void {
  Object.defineProperty(tree, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Creates a deep copy of a value. Sections and lists are never shared
 * between the copy and the original.
 *
 * @param value - The value to copy.
 * @returns An independent copy.
 */
export function cloneValue<T extends ConfigValue>(value: T): T;
export function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) {
    return value.map((item) => cloneValue(item));
  }
  if (isConfigTree(value)) {
    return cloneTree(value);
  }
  return value;
}

/**
 * Creates a deep copy of a section.
 *
 * @param tree - The section to copy.
 * @returns An independent copy with the same key order.
 */
export function cloneTree(tree: ConfigTree): ConfigTree {
  const copy: ConfigTree = {};
  for (const [key, value] of Object.entries(tree)) {
    setEntry(copy, key, cloneValue(value));
  }
  return copy;
}

/**
 * Structural equality over configuration values. Key order is ignored.
 *
 * @param a - First value.
 * @param b - Second value.
 * @returns True if both values hold the same data.
 */
export function configEquals(a: ConfigValue, b: ConfigValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && configEquals(item, other);
    });
  }
  if (isConfigTree(a) || isConfigTree(b)) {
    if (!isConfigTree(a) || !isConfigTree(b)) {
      return false;
    }
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) {
      return false;
    }
    return keys.every((key) => {
      const left = getEntry(a, key);
      const right = getEntry(b, key);
      return left !== undefined && right !== undefined && configEquals(left, right);
    });
  }
  return a === b;
}

/**
 * Returns the `@`-prefixed entries of a section, which together identify the
 * registered function the section describes.
 *
 * @param tree - The section to inspect.
 * @returns The identity entries, or undefined if the section has none.
 */
export function registryIdentity(tree: ConfigTree): Record<string, ConfigValue> | undefined {
  let identity: Record<string, ConfigValue> | undefined;
  for (const [key, value] of Object.entries(tree)) {
    if (key.startsWith(REGISTRY_KEY_PREFIX)) {
      identity ??= {};
      setEntry(identity, key, cloneValue(value));
    }
  }
  return identity;
}

/**
 * Checks whether a section describes a call to a registered function.
 *
 * @param tree - The section to inspect.
 * @returns True if any key starts with `@`.
 */
export function isRegistryReference(tree: ConfigTree): boolean {
  return Object.keys(tree).some((key) => key.startsWith(REGISTRY_KEY_PREFIX));
}

/**
 * Looks up a dotted path from the root of a tree.
 *
 * @param tree - The root section.
 * @param path - Path segments, outermost first.
 * @returns The value at the path, or undefined if any segment is missing or
 * walks through something other than a section.
 */
export function getAtPath(tree: ConfigTree, path: readonly string[]): ConfigValue | undefined {
  let current: ConfigValue = tree;
  for (const segment of path) {
    if (!isConfigTree(current)) {
      return undefined;
    }
    const next = getEntry(current, segment);
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }
  return current;
}

/**
 * Formats a path for messages, e.g. `training.optimizer.lr`.
 *
 * @param path - Path segments.
 * @returns The dotted form.
 */
export function formatPath(path: readonly string[]): string {
  return path.join('.');
}

/**
 * Converts the output of `JSON.parse` into a configuration value.
 *
 * @param raw - A value produced by `JSON.parse`.
 * @returns The equivalent configuration value.
 * @throws TypeError if the value holds a non-finite number.
 */
export function fromJson(raw: unknown): ConfigValue {
  if (raw === null || typeof raw === 'boolean' || typeof raw === 'string') {
    return raw;
  }
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) {
      throw new TypeError(`Number out of range: ${String(raw)}`);
    }
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map((item: unknown) => fromJson(item));
  }
  if (typeof raw === 'object') {
    const tree: ConfigTree = {};
    for (const [key, value] of Object.entries(raw)) {
      setEntry(tree, key, fromJson(value));
    }
    return tree;
  }
  throw new TypeError(`Unsupported JSON value of type ${typeof raw}`);
}
