import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { ConfigParseError } from '../tree/index.js';
import { Logger } from '../utils/logger.js';
import { Config } from './config.js';
import { fromDisk, toDisk } from './disk.js';

describe('disk', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cfgtree-disk-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should write rendered text, creating parent directories', async () => {
    const filePath = join(tempDir, 'nested', 'dir', 'out.cfg');
    await toDisk(filePath, { a: { x: 1 } });
    expect(await readFile(filePath, 'utf-8')).toBe('[a]\nx = 1\n');
  });

  it('should read back what it wrote', async () => {
    const filePath = join(tempDir, 'roundtrip.cfg');
    const tree = { a: { x: '${b.y}' }, b: { y: [1, 2] } };
    await toDisk(filePath, tree);
    expect(await fromDisk(filePath)).toEqual(tree);
    expect(await fromDisk(filePath, { interpolate: true })).toEqual({
      a: { x: [1, 2] },
      b: { y: [1, 2] },
    });
  });

  it('should report malformed files', async () => {
    const filePath = join(tempDir, 'broken.cfg');
    await writeFile(filePath, '[a\n');
    await expect(fromDisk(filePath)).rejects.toThrow(ConfigParseError);
  });

  it('should log file access at debug level', async () => {
    const lines: string[] = [];
    const originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      lines.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
    try {
      const logger = new Logger({ component: 'test', level: 'debug' });
      const filePath = join(tempDir, 'logged.cfg');
      await toDisk(filePath, { a: {} }, { logger });
      await fromDisk(filePath, { logger });
    } finally {
      process.stderr.write = originalWrite;
    }

    const events = lines.map((line): unknown => JSON.parse(line));
    expect(events).toEqual([
      expect.objectContaining({
        level: 'debug',
        event: 'file_written',
        data: { path: join(tempDir, 'logged.cfg'), bytes: 4 },
      }),
      expect.objectContaining({
        level: 'debug',
        event: 'file_read',
        data: { path: join(tempDir, 'logged.cfg'), bytes: 4 },
      }),
    ]);
  });

  it('should save and load Config documents', async () => {
    const filePath = join(tempDir, 'config.cfg');
    const config = Config.fromStr('[b]\ny = 1\n[a]\nx = 2\n', { sectionOrder: ['b'] });
    await config.toDisk(filePath);

    expect(await readFile(filePath, 'utf-8')).toBe('[b]\ny = 1\n\n[a]\nx = 2\n');
    const loaded = await Config.fromDisk(filePath);
    expect(loaded.toTree()).toEqual(config.toTree());
  });
});
