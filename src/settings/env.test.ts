import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS } from './defaults.js';
import { applyEnvOverrides, EnvCoercionError, readEnvOverrides } from './env.js';

describe('readEnvOverrides', () => {
  it('should read nothing from an empty environment', () => {
    expect(readEnvOverrides({})).toEqual({ overrides: {}, appliedVars: [] });
  });

  it('should read every variable', () => {
    const result = readEnvOverrides({
      CFGTREE_INTERPOLATE: 'yes',
      CFGTREE_SECTION_ORDER: 'paths, training,,',
      CFGTREE_LOG_LEVEL: 'INFO',
    });
    expect(result).toEqual({
      overrides: {
        render: { interpolate: true, section_order: ['paths', 'training'] },
        logging: { level: 'info' },
      },
      appliedVars: ['CFGTREE_INTERPOLATE', 'CFGTREE_SECTION_ORDER', 'CFGTREE_LOG_LEVEL'],
    });
  });

  it.each([
    ['true', true],
    ['1', true],
    ['On', true],
    ['false', false],
    ['0', false],
    ['no', false],
  ])('should read CFGTREE_INTERPOLATE=%s as %s', (raw, expected) => {
    expect(readEnvOverrides({ CFGTREE_INTERPOLATE: raw }).overrides.render?.interpolate).toBe(
      expected
    );
  });

  it('should ignore empty variables', () => {
    expect(readEnvOverrides({ CFGTREE_INTERPOLATE: '', CFGTREE_LOG_LEVEL: '' }).appliedVars).toEqual(
      []
    );
  });

  it('should reject values it cannot coerce', () => {
    expect(() => readEnvOverrides({ CFGTREE_INTERPOLATE: 'maybe' })).toThrow(EnvCoercionError);
    expect(() => readEnvOverrides({ CFGTREE_LOG_LEVEL: 'loud' })).toThrow(
      "Cannot coerce 'CFGTREE_LOG_LEVEL' value 'loud' to a log level. Expected one of: debug, info, warn, error"
    );
  });
});

describe('applyEnvOverrides', () => {
  it('should override only the variables that are set', () => {
    expect(applyEnvOverrides(DEFAULT_SETTINGS, { CFGTREE_SECTION_ORDER: 'a' })).toEqual({
      render: { interpolate: false, section_order: ['a'] },
      logging: { level: 'warn' },
    });
  });
});
