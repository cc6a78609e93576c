import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigOverrideError, InterpolationCycleError } from '../../tree/index.js';
import { CliUsageError } from '../args.js';
import { handleCheckCommand } from './check.js';
import { createTestContext } from './test-helpers.js';

describe('handleCheckCommand', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cfgtree-check-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('lists registered-function blocks of a valid file', async () => {
    const file = join(tempDir, 'model.cfg');
    await writeFile(
      file,
      '[model]\n@architectures = "tagger.v2"\nwidth = ${hyper.width}\n[hyper]\nwidth = 64\n'
    );
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = await handleCheckCommand(createTestContext([file]));

    expect(result.exitCode).toBe(0);
    expect(logSpy.mock.calls).toEqual([[`OK: ${file}`], ['  [model] @architectures = "tagger.v2"']]);
  });

  it('fails on circular references', async () => {
    const file = join(tempDir, 'cycle.cfg');
    await writeFile(file, '[a]\nx = ${b.y}\n[b]\ny = ${a.x}\n');
    vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(handleCheckCommand(createTestContext([file]))).rejects.toThrow(
      InterpolationCycleError
    );
  });

  it('resolves references against --set values', async () => {
    const file = join(tempDir, 'set.cfg');
    await writeFile(file, '[model]\nwidth = ${hyper.width}\n[hyper]\nwidth = 64\n');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    const result = await handleCheckCommand(createTestContext([file, '--set', 'hyper.width=128']));

    expect(result.exitCode).toBe(0);
    expect(logSpy.mock.calls).toEqual([[`OK: ${file}`]]);
  });

  it('fails when a --set path does not exist', async () => {
    const file = join(tempDir, 'set.cfg');
    await writeFile(file, '[model]\nwidth = 64\n');
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await expect(
      handleCheckCommand(createTestContext([file, '--set', 'missing.key=1']))
    ).rejects.toThrow(ConfigOverrideError);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it.each([
    [['--out', 'out.cfg']],
    [['--order', 'model']],
    [['--interpolate']],
    [['--no-interpolate']],
  ])('rejects output flags %j', async (flags) => {
    const file = join(tempDir, 'model.cfg');
    await writeFile(file, '[model]\nwidth = 64\n');

    await expect(handleCheckCommand(createTestContext([file, ...flags]))).rejects.toThrow(
      new CliUsageError('check does not write output; it accepts only --set')
    );
  });

  it('requires exactly one file', async () => {
    await expect(handleCheckCommand(createTestContext([]))).rejects.toThrow(
      'check expects exactly one file'
    );
  });
});
