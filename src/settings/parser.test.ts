import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS } from './defaults.js';
import { parseSettings, SettingsParseError } from './parser.js';

describe('parseSettings', () => {
  it('should return the defaults for an empty document', () => {
    expect(parseSettings('')).toEqual(DEFAULT_SETTINGS);
  });

  it('should read every setting', () => {
    const settings = parseSettings(`
[render]
interpolate = true
section_order = ["paths", "training"]

[logging]
level = "debug"
`);
    expect(settings).toEqual({
      render: { interpolate: true, section_order: ['paths', 'training'] },
      logging: { level: 'debug' },
    });
  });

  it('should fill in missing fields from the defaults', () => {
    expect(parseSettings('[render]\ninterpolate = true\n')).toEqual({
      render: { interpolate: true, section_order: [] },
      logging: { level: 'warn' },
    });
  });

  it('should not share the default section order', () => {
    const settings = parseSettings('');
    settings.render.section_order.push('x');
    expect(DEFAULT_SETTINGS.render.section_order).toEqual([]);
  });

  it('should ignore unknown keys', () => {
    expect(parseSettings('[other]\nkey = 1\n')).toEqual(DEFAULT_SETTINGS);
  });

  describe('errors', () => {
    it('should reject invalid TOML', () => {
      expect(() => parseSettings('[render')).toThrow(SettingsParseError);
      expect(() => parseSettings('[render')).toThrow(/^Invalid TOML syntax: /);
    });

    it('should reject values of the wrong type', () => {
      expect(() => parseSettings('[render]\ninterpolate = "yes"\n')).toThrow(
        "Invalid type for 'render.interpolate': expected boolean, got string"
      );
      expect(() => parseSettings('[render]\nsection_order = "paths"\n')).toThrow(
        "Invalid type for 'render.section_order': expected array of strings, got string"
      );
      expect(() => parseSettings('[render]\nsection_order = [1]\n')).toThrow(
        "Invalid type for 'render.section_order[0]': expected string, got number"
      );
      expect(() => parseSettings('render = 1\n')).toThrow(
        "Invalid type for 'render': expected table, got number"
      );
    });

    it('should reject unknown log levels', () => {
      expect(() => parseSettings('[logging]\nlevel = "loud"\n')).toThrow(
        "Invalid value for 'logging.level': expected one of debug, info, warn, error, got loud"
      );
    });
  });
});
