/**
 * File access with path validation.
 *
 * Every path is checked and resolved to an absolute path before it reaches
 * the file system.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates a path and resolves it against the working directory.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }
  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }
  return path.resolve(filePath);
}

/**
 * Reads a whole file as bytes.
 *
 * @param filePath - The file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadBytes(filePath: string): Promise<Uint8Array> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  const buffer = await fs.readFile(validatedPath);
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

/**
 * Writes bytes to a file, creating missing parent directories.
 *
 * @param filePath - The file to write.
 * @param data - The bytes to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteBytes(filePath: string, data: Uint8Array): Promise<void> {
  const validatedPath = validatePath(filePath);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  await fs.mkdir(path.dirname(validatedPath), { recursive: true });
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  await fs.writeFile(validatedPath, data);
}

/**
 * Reads a UTF-8 text file if it exists.
 *
 * @param filePath - The file to read.
 * @returns The text, or undefined when the file does not exist.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadTextIfExists(filePath: string): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
    return await fs.readFile(validatedPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}
