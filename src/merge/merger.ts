/**
 * Deep merge of configuration trees.
 *
 * Precedence, per key:
 * - a key on one side only is copied;
 * - a placeholder in the base is kept, whatever the override holds;
 * - two registered-function blocks naming different functions: the override
 *   block replaces the base block whole;
 * - two sections otherwise merge key by key;
 * - in every other case the override wins. Lists are replaced, not merged.
 *
 * @packageDocumentation
 */

import {
  cloneTree,
  cloneValue,
  configEquals,
  getEntry,
  isConfigTree,
  isPlaceholder,
  registryIdentity,
  setEntry,
  type ConfigTree,
  type ConfigValue,
  type MergeDiagnostic,
  type MergeResult,
} from '../tree/index.js';

function mergeValue(
  base: ConfigValue,
  override: ConfigValue,
  path: readonly string[],
  diagnostics: MergeDiagnostic[]
): ConfigValue {
  if (typeof base === 'string' && isPlaceholder(base)) {
    if (!configEquals(base, override)) {
      diagnostics.push({
        kind: 'placeholder-kept',
        path,
        placeholder: base,
        ignored: cloneValue(override),
      });
    }
    return base;
  }

  if (isConfigTree(base) && isConfigTree(override)) {
    const baseIdentity = registryIdentity(base);
    const overrideIdentity = registryIdentity(override);
    if (
      baseIdentity !== undefined &&
      overrideIdentity !== undefined &&
      !configEquals(baseIdentity, overrideIdentity)
    ) {
      diagnostics.push({ kind: 'registry-replaced', path, baseIdentity, overrideIdentity });
      return cloneTree(override);
    }
    return mergeSections(base, override, path, diagnostics);
  }

  if (isConfigTree(base) !== isConfigTree(override)) {
    diagnostics.push({
      kind: 'section-replaced',
      path,
      base: cloneValue(base),
      override: cloneValue(override),
    });
  }
  return cloneValue(override);
}

function mergeSections(
  base: ConfigTree,
  override: ConfigTree,
  path: readonly string[],
  diagnostics: MergeDiagnostic[]
): ConfigTree {
  const result: ConfigTree = {};

  for (const [key, baseValue] of Object.entries(base)) {
    const overrideValue = getEntry(override, key);
    setEntry(
      result,
      key,
      overrideValue === undefined
        ? cloneValue(baseValue)
        : mergeValue(baseValue, overrideValue, [...path, key], diagnostics)
    );
  }
  for (const [key, overrideValue] of Object.entries(override)) {
    if (getEntry(base, key) === undefined) {
      setEntry(result, key, cloneValue(overrideValue));
    }
  }

  return result;
}

/**
 * Merges an override tree into a base tree and reports what was discarded.
 *
 * Neither input is modified; the result shares no sections or lists with
 * them.
 *
 * @param base - The tree providing defaults.
 * @param override - The tree whose values take precedence.
 * @returns The merged tree and its diagnostics.
 */
export function mergeWithDiagnostics(base: ConfigTree, override: ConfigTree): MergeResult {
  const diagnostics: MergeDiagnostic[] = [];
  const tree = mergeSections(base, override, [], diagnostics);
  return { tree, diagnostics };
}

/**
 * Merges an override tree into a base tree. Never throws.
 *
 * @param base - The tree providing defaults.
 * @param override - The tree whose values take precedence.
 * @returns A new merged tree.
 *
 * @example
 * ```typescript
 * merge(
 *   { opt: { '@optimizers': 'adam.v1', lr: 0.01 } },
 *   { opt: { '@optimizers': 'sgd.v1', lr: 0.1 } }
 * );
 * // { opt: { '@optimizers': 'sgd.v1', lr: 0.1 } }
 * ```
 */
export function merge(base: ConfigTree, override: ConfigTree): ConfigTree {
  return mergeWithDiagnostics(base, override).tree;
}
