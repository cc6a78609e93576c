/**
 * Renders configuration trees back to the sectioned text format.
 *
 * Output is deterministic: top-level sections follow the caller's order and
 * then the alphabet, and keys inside a section are sorted. Values are written
 * as JSON, except placeholders, which are written bare.
 *
 * @packageDocumentation
 */

import { interpolate } from '../interpolate/index.js';
import { COMMENT_MARKERS, KEY_PATTERN } from '../parser/index.js';
import {
  ConfigSerializeError,
  formatPath,
  getEntry,
  isPlaceholder,
  type ConfigTree,
  type ConfigValue,
} from '../tree/index.js';

/**
 * Options for {@link render}.
 */
export interface RenderOptions {
  /**
   * Resolve placeholders before rendering.
   * @defaultValue false
   */
  readonly interpolate?: boolean | undefined;

  /**
   * Top-level section names to emit first, in this order. Sections not listed
   * follow alphabetically; names with no matching section are ignored.
   */
  readonly sectionOrder?: readonly string[] | undefined;
}

function isPlainObject(value: unknown): value is ConfigTree {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function isWritableKey(key: string): boolean {
  return KEY_PATTERN.test(key) && !COMMENT_MARKERS.some((marker) => key.startsWith(marker));
}

function describe(value: unknown): string {
  if (typeof value === 'number') {
    return `non-finite number ${String(value)}`;
  }
  if (typeof value === 'object' && value !== null) {
    return `object ${Object.prototype.toString.call(value)}`;
  }
  return `value of type ${typeof value}`;
}

/**
 * Throws unless a value (and everything inside it) belongs to the value union.
 */
function assertRepresentable(value: unknown, location: string): void {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item: unknown, index) => {
      assertRepresentable(item, `${location}[${String(index)}]`);
    });
    return;
  }
  if (isPlainObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      assertRepresentable(child, `${location}.${key}`);
    }
    return;
  }
  throw new ConfigSerializeError(location, `${describe(value)} is not a configuration value`);
}

function renderValue(value: ConfigValue, location: string): string {
  if (isPlaceholder(value)) {
    return String(value);
  }
  assertRepresentable(value, location);
  return JSON.stringify(value);
}

/**
 * A nested section is written as its own `[a.b]` block when every entry in it
 * can be written; otherwise it is written inline as JSON.
 */
function rendersAsSection(value: unknown): value is ConfigTree {
  return (
    isPlainObject(value) &&
    Object.entries(value).every(
      ([key, child]) => KEY_PATTERN.test(key) && (isWritableKey(key) || rendersAsSection(child))
    )
  );
}

function renderSection(path: readonly string[], section: ConfigTree, blocks: string[]): void {
  const lines = [`[${formatPath(path)}]`];
  const subsections: string[] = [];

  for (const key of Object.keys(section).sort()) {
    const value = getEntry(section, key);
    if (value === undefined) {
      continue;
    }
    if (KEY_PATTERN.test(key) && rendersAsSection(value)) {
      subsections.push(key);
      continue;
    }
    const location = formatPath([...path, key]);
    if (!isWritableKey(key)) {
      throw new ConfigSerializeError(location, `key '${key}' cannot be written as an assignment`);
    }
    lines.push(`${key} = ${renderValue(value, location)}`);
  }

  blocks.push(lines.join('\n'));

  for (const key of subsections) {
    const child = getEntry(section, key);
    if (child !== undefined && rendersAsSection(child)) {
      renderSection([...path, key], child, blocks);
    }
  }
}

/**
 * Orders top-level section names: listed names first, then the rest sorted.
 *
 * @param keys - Top-level keys of the tree.
 * @param sectionOrder - Preferred order.
 * @returns Every key exactly once.
 */
export function orderSections(keys: readonly string[], sectionOrder: readonly string[]): string[] {
  const present = new Set(keys);
  const ordered: string[] = [];
  for (const name of sectionOrder) {
    if (present.has(name) && !ordered.includes(name)) {
      ordered.push(name);
    }
  }
  const rest = keys.filter((key) => !ordered.includes(key)).sort();
  return [...ordered, ...rest];
}

/**
 * Renders a tree as configuration text.
 *
 * @param tree - The tree to render; it is not modified.
 * @param options - Interpolation and section order.
 * @returns Text that {@link parse} reads back into an equal tree.
 * @throws ConfigSerializeError if the tree holds a top-level value that is not
 * a section, a key the format cannot express, or a value outside the
 * configuration value union.
 *
 * @example
 * ```typescript
 * render({ a: { x: 1, b: { y: 2 } } });
 * // '[a]\nx = 1\n\n[a.b]\ny = 2\n'
 * ```
 */
export function render(tree: ConfigTree, options: RenderOptions = {}): string {
  const source = options.interpolate === true ? interpolate(tree) : tree;
  const blocks: string[] = [];

  for (const key of orderSections(Object.keys(source), options.sectionOrder ?? [])) {
    const value = getEntry(source, key);
    if (value === undefined) {
      continue;
    }
    if (!KEY_PATTERN.test(key)) {
      throw new ConfigSerializeError(key, `'${key}' is not a valid section name`);
    }
    if (!isPlainObject(value)) {
      throw new ConfigSerializeError(key, 'top-level values must be sections');
    }
    renderSection([key], value, blocks);
  }

  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`;
}
