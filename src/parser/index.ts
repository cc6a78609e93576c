/**
 * Parsing of configuration text into trees.
 *
 * @packageDocumentation
 */

export { parse } from './parse.js';
export type { ParseOptions } from './parse.js';
export { coerceValue, quoteBarePlaceholders } from './coerce.js';
export { COMMENT_MARKERS, KEY_PATTERN, parseStructure } from './parser.js';
export { applyOverrides } from './overrides.js';
export type { ConfigOverrides } from './overrides.js';
