/**
 * Byte encoding of configuration text (UTF-8, no header).
 *
 * @packageDocumentation
 */

import { parse, type ParseOptions } from '../parser/index.js';
import { ConfigParseError, type ConfigTree } from '../tree/index.js';
import { render, type RenderOptions } from './serializer.js';

const encoder = new TextEncoder();

/**
 * Renders a tree and encodes the text as UTF-8.
 *
 * @param tree - The tree to encode.
 * @param options - Render options.
 * @returns The encoded configuration.
 */
export function toBytes(tree: ConfigTree, options: RenderOptions = {}): Uint8Array {
  return encoder.encode(render(tree, options));
}

/**
 * Decodes UTF-8 configuration bytes and parses them.
 *
 * @param bytes - The encoded configuration.
 * @param options - Parse options.
 * @returns The parsed tree.
 * @throws ConfigParseError if the bytes are not valid UTF-8 or the text is
 * malformed.
 */
export function fromBytes(bytes: Uint8Array, options: ParseOptions = {}): ConfigTree {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw new ConfigParseError(
      'Configuration bytes are not valid UTF-8',
      undefined,
      error instanceof Error ? error : undefined
    );
  }
  return parse(text, options);
}
