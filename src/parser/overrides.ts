/**
 * Dotted-path overrides applied after parsing.
 *
 * @packageDocumentation
 */

import {
  cloneTree,
  cloneValue,
  ConfigOverrideError,
  getEntry,
  isConfigTree,
  setEntry,
  type ConfigTree,
  type ConfigValue,
} from '../tree/index.js';
import { KEY_PATTERN } from './parser.js';

/**
 * Overrides keyed by dotted path, e.g. `{ 'training.dropout': 0.2 }`.
 */
export type ConfigOverrides = Readonly<Record<string, ConfigValue>>;

// Sections merge key by key; anything else, lists included, is replaced.
function overlay(current: ConfigValue | undefined, value: ConfigValue): ConfigValue {
  if (current === undefined || !isConfigTree(current) || !isConfigTree(value)) {
    return cloneValue(value);
  }
  const result = cloneTree(current);
  for (const [key, child] of Object.entries(value)) {
    setEntry(result, key, overlay(getEntry(result, key), child));
  }
  return result;
}

/**
 * Returns a copy of a tree with each override written to its dotted path.
 *
 * Every section on the way to the leaf must already exist. The leaf itself
 * may be new, and whatever value it held before (a placeholder included) is
 * replaced. A section given for an existing section is merged into it, the
 * override winning on every key it names.
 *
 * @param tree - The tree to start from; it is not modified.
 * @param overrides - Values keyed by dotted path.
 * @returns A new tree with the overrides applied.
 * @throws ConfigOverrideError if a path is malformed or its parent section is
 * missing.
 */
export function applyOverrides(tree: ConfigTree, overrides: ConfigOverrides): ConfigTree {
  const result = cloneTree(tree);

  for (const [path, value] of Object.entries(overrides)) {
    const segments = path.split('.');
    if (segments.length < 2 || segments.some((segment) => !KEY_PATTERN.test(segment))) {
      throw new ConfigOverrideError(path, 'expected a dotted path such as "section.key"');
    }

    const leaf = segments[segments.length - 1] ?? '';
    let section = result;
    for (const segment of segments.slice(0, -1)) {
      const next = getEntry(section, segment);
      if (next === undefined) {
        throw new ConfigOverrideError(path, `section '${segment}' does not exist`);
      }
      if (!isConfigTree(next)) {
        throw new ConfigOverrideError(path, `'${segment}' is a value, not a section`);
      }
      section = next;
    }

    setEntry(section, leaf, overlay(getEntry(section, leaf), value));
  }

  return result;
}
