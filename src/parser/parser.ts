/**
 * Structure parser for the sectioned configuration format.
 *
 * ```
 * [training.optimizer]
 * @optimizers = "adam.v1"
 * learn_rate = 0.001
 * dropout = ${hyper.dropout}
 * ```
 *
 * @packageDocumentation
 */

import {
  ConfigParseError,
  getEntry,
  isConfigTree,
  setEntry,
  type ConfigTree,
} from '../tree/index.js';
import { coerceValue } from './coerce.js';

/**
 * Characters that start a comment line.
 */
export const COMMENT_MARKERS: readonly string[] = ['#', ';'];

/**
 * Keys and section name segments: no dots, brackets, `=` or whitespace.
 */
export const KEY_PATTERN = /^[^\s.[\]=]+$/;

/**
 * Checks whether a line should be skipped.
 *
 * @param trimmed - The line with surrounding whitespace removed.
 * @returns True for blank lines and comments.
 */
function isIgnorable(trimmed: string): boolean {
  return trimmed === '' || COMMENT_MARKERS.some((marker) => trimmed.startsWith(marker));
}

/**
 * Parses the contents of a `[a.b.c]` header into path segments.
 *
 * @param trimmed - The header line, trimmed.
 * @param lineNumber - 1-based line number for error messages.
 * @returns The section path.
 * @throws ConfigParseError if the header is malformed.
 */
function parseSectionHeader(trimmed: string, lineNumber: number): string[] {
  if (!trimmed.endsWith(']')) {
    throw new ConfigParseError(`Unbalanced brackets in section header '${trimmed}'`, lineNumber);
  }
  const inner = trimmed.slice(1, -1).trim();
  if (inner.includes('[') || inner.includes(']')) {
    throw new ConfigParseError(`Unbalanced brackets in section header '${trimmed}'`, lineNumber);
  }
  if (inner === '') {
    throw new ConfigParseError('Empty section name', lineNumber);
  }

  const segments = inner.split('.').map((segment) => segment.trim());
  for (const segment of segments) {
    if (!KEY_PATTERN.test(segment)) {
      throw new ConfigParseError(`Invalid section name '${inner}'`, lineNumber);
    }
  }
  return segments;
}

/**
 * Resolves a section path from the root, creating missing sections.
 *
 * @param root - The tree being built.
 * @param segments - Section path segments.
 * @param lineNumber - 1-based line number for error messages.
 * @returns The section at the path.
 * @throws ConfigParseError if a segment already holds a non-section value.
 */
function openSection(root: ConfigTree, segments: readonly string[], lineNumber: number): ConfigTree {
  let current = root;
  segments.forEach((segment, index) => {
    const existing = getEntry(current, segment);
    if (existing === undefined) {
      const created: ConfigTree = {};
      setEntry(current, segment, created);
      current = created;
      return;
    }
    if (!isConfigTree(existing)) {
      const path = segments.slice(0, index + 1).join('.');
      throw new ConfigParseError(
        `Section '[${segments.join('.')}]' conflicts with the value already assigned to '${path}'`,
        lineNumber
      );
    }
    current = existing;
  });
  return current;
}

/**
 * Parses configuration text into a nested tree. Placeholders are kept as
 * strings; nothing is interpolated here.
 *
 * @param text - The configuration text.
 * @returns The root section.
 * @throws ConfigParseError for malformed headers, stray lines, assignments
 * before the first section, or conflicts between sections and values.
 *
 * @example
 * ```typescript
 * parseStructure('[a]\nx = 1\n[a.b]\ny = 2\n');
 * // { a: { x: 1, b: { y: 2 } } }
 * ```
 */
export function parseStructure(text: string): ConfigTree {
  const root: ConfigTree = {};
  let current: ConfigTree | undefined;
  let currentPath: string[] = [];

  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const trimmed = line.trim();

    if (isIgnorable(trimmed)) {
      return;
    }

    if (trimmed.startsWith('[')) {
      currentPath = parseSectionHeader(trimmed, lineNumber);
      current = openSection(root, currentPath, lineNumber);
      return;
    }

    const separator = trimmed.indexOf('=');
    if (separator === -1) {
      throw new ConfigParseError(
        `Expected a section header or 'key = value', got '${trimmed}'`,
        lineNumber
      );
    }

    const key = trimmed.slice(0, separator).trim();
    if (!KEY_PATTERN.test(key)) {
      throw new ConfigParseError(`Invalid key '${key}'`, lineNumber);
    }
    if (current === undefined) {
      throw new ConfigParseError(`Assignment to '${key}' before any section header`, lineNumber);
    }

    const existing = getEntry(current, key);
    if (existing !== undefined && isConfigTree(existing)) {
      throw new ConfigParseError(
        `Cannot assign a value to '${[...currentPath, key].join('.')}': it is already a section`,
        lineNumber
      );
    }

    setEntry(current, key, coerceValue(trimmed.slice(separator + 1).trim()));
  });

  return root;
}
