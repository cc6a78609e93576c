import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import {
  PathValidationError,
  safeReadBytes,
  safeReadTextIfExists,
  safeWriteBytes,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'cfgtree-safe-fs-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should resolve relative paths to absolute', () => {
      expect(validatePath('./test.cfg')).toBe(path.resolve('test.cfg'));
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/a\0b')).toThrow('Path cannot contain null bytes');
    });
  });

  describe('safeWriteBytes and safeReadBytes', () => {
    it('should create parent directories and read the bytes back', async () => {
      const filePath = path.join(tempDir, 'a', 'b', 'data.bin');
      await safeWriteBytes(filePath, new Uint8Array([1, 2, 3]));

      expect(Array.from(await safeReadBytes(filePath))).toEqual([1, 2, 3]);
      expect(Array.from(await readFile(filePath))).toEqual([1, 2, 3]);
    });

    it('should reject reading a missing file', async () => {
      await expect(safeReadBytes(path.join(tempDir, 'missing.bin'))).rejects.toThrow();
    });
  });

  describe('safeReadTextIfExists', () => {
    it('should read existing files as text', async () => {
      const filePath = path.join(tempDir, 'text.txt');
      await writeFile(filePath, 'héllo');
      expect(await safeReadTextIfExists(filePath)).toBe('héllo');
    });

    it('should return undefined for a missing file', async () => {
      expect(await safeReadTextIfExists(path.join(tempDir, 'nope.txt'))).toBeUndefined();
    });

    it('should propagate other errors', async () => {
      await expect(safeReadTextIfExists(tempDir)).rejects.toThrow();
    });
  });
});
