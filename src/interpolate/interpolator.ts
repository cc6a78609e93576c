/**
 * Placeholder interpolation.
 *
 * Replaces every `${dotted.path}` value with a copy of the value found at that
 * path, resolving chains of placeholders and reporting cycles.
 *
 * @packageDocumentation
 */

import {
  cloneValue,
  getAtPath,
  InterpolationCycleError,
  isConfigTree,
  isPlaceholder,
  placeholderPath,
  setEntry,
  UnresolvedReferenceError,
  type ConfigTree,
  type ConfigValue,
} from '../tree/index.js';

/**
 * Bookkeeping for a single interpolation pass.
 */
interface InterpolationState {
  readonly root: ConfigTree;
  /** Paths currently being resolved, in order. */
  readonly visiting: string[];
  /** Fully resolved values by dotted path. */
  readonly resolved: Map<string, ConfigValue>;
}

// List positions are kept as `[n]` segments: `a.b[0].c`.
function describeLocation(path: readonly string[]): string {
  return path.reduce(
    (text, segment) =>
      segment.startsWith('[') || text === '' ? `${text}${segment}` : `${text}.${segment}`,
    ''
  );
}

function resolveReference(
  reference: string,
  usedAt: readonly string[],
  state: InterpolationState
): ConfigValue {
  const cached = state.resolved.get(reference);
  if (cached !== undefined) {
    return cloneValue(cached);
  }
  if (state.visiting.includes(reference)) {
    const start = state.visiting.indexOf(reference);
    throw new InterpolationCycleError([...state.visiting.slice(start), reference]);
  }

  const segments = reference.split('.');
  const target = getAtPath(state.root, segments);
  if (target === undefined) {
    throw new UnresolvedReferenceError(reference, describeLocation(usedAt));
  }

  state.visiting.push(reference);
  const value = visit(target, segments, state);
  state.visiting.pop();

  state.resolved.set(reference, value);
  return cloneValue(value);
}

function visit(value: ConfigValue, path: readonly string[], state: InterpolationState): ConfigValue {
  if (typeof value === 'string') {
    const reference = placeholderPath(value);
    return reference === undefined ? value : resolveReference(reference, path, state);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => visit(item, [...path, `[${String(index)}]`], state));
  }
  if (isConfigTree(value)) {
    const result: ConfigTree = {};
    for (const [key, child] of Object.entries(value)) {
      setEntry(result, key, visit(child, [...path, key], state));
    }
    return result;
  }
  return value;
}

/**
 * Resolves every placeholder in a tree.
 *
 * The input is left untouched. Each substituted value is an independent deep
 * copy, so changing one location in the result never affects another.
 *
 * @param tree - The tree to interpolate.
 * @returns A new tree without placeholders.
 * Paths are looked up in the tree as written. A path that runs through a
 * placeholder (`${a.b.d}` where `a.b` is `${c}`) is not followed and is
 * reported as unresolved; refer to the target directly (`${c.d}`).
 *
 * @throws UnresolvedReferenceError if a placeholder names a missing path.
 * @throws InterpolationCycleError if placeholders refer to each other in a loop.
 *
 * @example
 * ```typescript
 * interpolate({ hp: { dropout: 0.1 }, training: { dropout: '${hp.dropout}' } });
 * // { hp: { dropout: 0.1 }, training: { dropout: 0.1 } }
 * ```
 */
export function interpolate(tree: ConfigTree): ConfigTree {
  const state: InterpolationState = { root: tree, visiting: [], resolved: new Map() };
  const result: ConfigTree = {};
  for (const [key, value] of Object.entries(tree)) {
    setEntry(result, key, visit(value, [key], state));
  }
  return result;
}

/**
 * Checks whether a value still contains placeholders anywhere.
 *
 * @param value - A tree or any value inside one.
 * @returns True if no placeholder remains.
 */
export function isInterpolated(value: ConfigValue): boolean {
  if (isPlaceholder(value)) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.every((item) => isInterpolated(item));
  }
  if (isConfigTree(value)) {
    return Object.values(value).every((child) => isInterpolated(child));
  }
  return true;
}
