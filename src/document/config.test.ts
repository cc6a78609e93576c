import { describe, expect, it } from 'vitest';
import { isConfigTree } from '../tree/index.js';
import { Config } from './config.js';

const TEXT = `
[training]
dropout = \${hyper.dropout}

[training.optimizer]
@optimizers = "adam.v1"
learn_rate = 0.001

[hyper]
dropout = 0.2
`;

describe('Config', () => {
  it('should read values by dotted path', () => {
    const config = Config.fromStr(TEXT);
    expect(config.get('training.optimizer.learn_rate')).toBe(0.001);
    expect(config.get('training.dropout')).toBe('${hyper.dropout}');
    expect(config.get('training.missing')).toBeUndefined();
  });

  it('should hand out copies of its values', () => {
    const config = Config.fromStr(TEXT);
    const optimizer = config.get('training.optimizer');
    if (optimizer === undefined || !isConfigTree(optimizer)) {
      throw new Error('expected section');
    }
    optimizer.learn_rate = 1;
    expect(config.get('training.optimizer.learn_rate')).toBe(0.001);

    const tree = config.toTree();
    tree.hyper = {};
    expect(config.get('hyper.dropout')).toBe(0.2);
  });

  it('should interpolate into a new Config', () => {
    const config = Config.fromStr(TEXT);
    const resolved = config.interpolate();
    expect(config.isInterpolated()).toBe(false);
    expect(resolved.isInterpolated()).toBe(true);
    expect(resolved.get('training.dropout')).toBe(0.2);
  });

  it('should render with its section order', () => {
    const config = Config.fromStr(TEXT, { sectionOrder: ['training'] });
    expect(config.toStr()).toBe(
      [
        '[training]',
        'dropout = ${hyper.dropout}',
        '',
        '[training.optimizer]',
        '@optimizers = "adam.v1"',
        'learn_rate = 0.001',
        '',
        '[hyper]',
        'dropout = 0.2',
        '',
      ].join('\n')
    );
    expect(config.toStr({ interpolate: true })).toContain('[training]\ndropout = 0.2\n');
  });

  it('should merge and keep the diagnostics', () => {
    const base = Config.fromStr(TEXT, { sectionOrder: ['hyper'] });
    const merged = base.merge(
      Config.fromStr('[training.optimizer]\n@optimizers = "sgd.v1"\n[hyper]\ndropout = 0.5\n')
    );

    expect(merged.get('training.optimizer')).toEqual({ '@optimizers': 'sgd.v1' });
    expect(merged.get('hyper.dropout')).toBe(0.5);
    expect(merged.sectionOrder).toEqual(['hyper']);
    expect(merged.diagnostics.map((diagnostic) => diagnostic.kind)).toEqual(['registry-replaced']);
    expect(base.diagnostics).toEqual([]);
  });

  it('should merge a plain tree', () => {
    const merged = Config.fromStr(TEXT).merge({ training: { dropout: 0.9 } });
    expect(merged.get('training.dropout')).toBe('${hyper.dropout}');
    expect(merged.diagnostics).toHaveLength(1);
  });

  it('should apply overrides while loading', () => {
    const config = Config.fromStr(TEXT, { overrides: { 'hyper.dropout': 0.4 }, interpolate: true });
    expect(config.get('training.dropout')).toBe(0.2);
    expect(config.get('hyper.dropout')).toBe(0.4);
  });

  it('should round-trip through bytes', () => {
    const config = Config.fromStr(TEXT);
    expect(Config.fromBytes(config.toBytes()).toTree()).toEqual(config.toTree());
  });

  it('should copy with the same contents', () => {
    const config = Config.fromStr(TEXT, { sectionOrder: ['hyper'] });
    const copy = config.copy();
    expect(copy).not.toBe(config);
    expect(copy.toTree()).toEqual(config.toTree());
    expect(copy.sectionOrder).toEqual(['hyper']);
  });
});
