import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CliUsageError } from '../args.js';
import { describeDiagnostic, handleMergeCommand } from './merge.js';
import { captureStream, createTestContext } from './test-helpers.js';

const BASE = `
[training]
dropout = \${hyper.dropout}

[training.optimizer]
@optimizers = "adam.v1"
learn_rate = 0.001
beta = 0.9

[hyper]
dropout = 0.2
`;

const OVERRIDE = `
[training]
dropout = 0.5

[training.optimizer]
@optimizers = "sgd.v1"
learn_rate = 0.1
`;

describe('handleMergeCommand', () => {
  let tempDir: string;
  let basePath: string;
  let overridePath: string;
  let stdout: ReturnType<typeof captureStream>;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'cfgtree-merge-'));
    basePath = join(tempDir, 'base.cfg');
    overridePath = join(tempDir, 'override.cfg');
    await writeFile(basePath, BASE);
    await writeFile(overridePath, OVERRIDE);
    stdout = captureStream(process.stdout);
  });

  afterEach(async () => {
    stdout.restore();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('prints the merged configuration', async () => {
    const result = await handleMergeCommand(createTestContext([basePath, overridePath]));

    expect(result.exitCode).toBe(0);
    expect(stdout.output.join('')).toBe(
      [
        '[hyper]',
        'dropout = 0.2',
        '',
        '[training]',
        'dropout = ${hyper.dropout}',
        '',
        '[training.optimizer]',
        '@optimizers = "sgd.v1"',
        'learn_rate = 0.1',
        '',
      ].join('\n')
    );
  });

  it('interpolates after merging and then applies overrides', async () => {
    await handleMergeCommand(
      createTestContext([basePath, overridePath, '--interpolate', '--set', 'hyper.dropout=0.4'])
    );

    expect(stdout.output.join('')).toContain('[hyper]\ndropout = 0.4\n\n[training]\ndropout = 0.2\n');
  });

  it('logs what the merge discarded', async () => {
    const stderr = captureStream(process.stderr);
    try {
      await handleMergeCommand(createTestContext([basePath, overridePath], undefined, 'warn'));
    } finally {
      stderr.restore();
    }

    const entries = stderr.output.map((line): unknown => JSON.parse(line));
    expect(entries).toEqual([
      expect.objectContaining({
        level: 'warn',
        component: 'test.merge',
        event: 'merge_diagnostic',
        data: {
          kind: 'placeholder-kept',
          path: 'training.dropout',
          message: 'training.dropout: kept ${hyper.dropout}, ignored 0.5',
        },
      }),
      expect.objectContaining({
        event: 'merge_diagnostic',
        data: {
          kind: 'registry-replaced',
          path: 'training.optimizer',
          message:
            'training.optimizer: replaced {"@optimizers":"adam.v1"} with {"@optimizers":"sgd.v1"}; base arguments dropped',
        },
      }),
    ]);
  });

  it('writes to a file with --out', async () => {
    const out = join(tempDir, 'run.cfg');
    await handleMergeCommand(createTestContext([basePath, overridePath, '--out', out, '--order', 'training']));

    expect(await readFile(out, 'utf-8')).toMatch(/^\[training\]\n/);
    expect(stdout.output).toEqual([]);
  });

  it('requires two files', async () => {
    await expect(handleMergeCommand(createTestContext([basePath]))).rejects.toThrow(CliUsageError);
  });
});

describe('describeDiagnostic', () => {
  it('describes a section replaced by a value', () => {
    expect(
      describeDiagnostic({ kind: 'section-replaced', path: ['a', 'b'], base: { c: 1 }, override: 2 })
    ).toBe('a.b: section and value conflict; override value used');
  });
});
