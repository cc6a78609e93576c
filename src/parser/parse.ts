/**
 * Entry point that ties parsing, interpolation and overrides together.
 *
 * @packageDocumentation
 */

import { interpolate } from '../interpolate/index.js';
import type { ConfigTree } from '../tree/index.js';
import { applyOverrides, type ConfigOverrides } from './overrides.js';
import { parseStructure } from './parser.js';

/**
 * Options for {@link parse}.
 */
export interface ParseOptions {
  /**
   * Resolve placeholders after parsing.
   * @defaultValue false
   */
  readonly interpolate?: boolean | undefined;

  /**
   * Values keyed by dotted path, written after parsing (and after
   * interpolation when it is requested).
   */
  readonly overrides?: ConfigOverrides | undefined;
}

/**
 * Parses configuration text into a tree.
 *
 * @param text - The configuration text.
 * @param options - Interpolation and override settings.
 * @returns The parsed tree.
 * @throws ConfigParseError if the text is malformed.
 * @throws UnresolvedReferenceError or InterpolationCycleError when
 * interpolating.
 * @throws ConfigOverrideError if an override cannot be applied.
 *
 * @example
 * ```typescript
 * const tree = parse('[a]\nx = 1\n[a.b]\ny = 2\n', { overrides: { 'a.x': 99 } });
 * // { a: { x: 99, b: { y: 2 } } }
 * ```
 */
export function parse(text: string, options: ParseOptions = {}): ConfigTree {
  let tree = parseStructure(text);
  if (options.interpolate === true) {
    tree = interpolate(tree);
  }
  if (options.overrides !== undefined && Object.keys(options.overrides).length > 0) {
    tree = applyOverrides(tree, options.overrides);
  }
  return tree;
}
