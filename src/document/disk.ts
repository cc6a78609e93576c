/**
 * Reading and writing configuration files.
 *
 * A file holds exactly the configuration text, UTF-8 encoded.
 *
 * @packageDocumentation
 */

import type { ParseOptions } from '../parser/index.js';
import { fromBytes, toBytes, type RenderOptions } from '../serialize/index.js';
import type { ConfigTree } from '../tree/index.js';
import type { Logger } from '../utils/logger.js';
import { safeReadBytes, safeWriteBytes } from '../utils/safe-fs.js';

/**
 * Options shared by the disk helpers.
 */
export interface DiskOptions {
  /** Receives `file_read` and `file_written` debug entries. */
  readonly logger?: Logger | undefined;
}

/**
 * Renders a tree and writes it to a file, creating parent directories.
 *
 * @param filePath - Destination file.
 * @param tree - The tree to write.
 * @param options - Render options and an optional logger.
 * @throws ConfigSerializeError if the tree cannot be rendered; nothing is
 * written in that case.
 */
export async function toDisk(
  filePath: string,
  tree: ConfigTree,
  options: RenderOptions & DiskOptions = {}
): Promise<void> {
  const bytes = toBytes(tree, options);
  await safeWriteBytes(filePath, bytes);
  options.logger?.debug('file_written', { path: filePath, bytes: bytes.byteLength });
}

/**
 * Reads a configuration file and parses it.
 *
 * @param filePath - The file to read.
 * @param options - Parse options and an optional logger.
 * @returns The parsed tree.
 * @throws ConfigParseError if the file is not valid configuration text.
 */
export async function fromDisk(
  filePath: string,
  options: ParseOptions & DiskOptions = {}
): Promise<ConfigTree> {
  const bytes = await safeReadBytes(filePath);
  options.logger?.debug('file_read', { path: filePath, bytes: bytes.byteLength });
  return fromBytes(bytes, options);
}
