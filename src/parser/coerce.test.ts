import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { render } from '../serialize/index.js';
import { coerceValue, quoteBarePlaceholders } from './coerce.js';
import { parse } from './parse.js';

describe('coerceValue', () => {
  it('should read JSON literals', () => {
    expect(coerceValue('true')).toBe(true);
    expect(coerceValue('false')).toBe(false);
    expect(coerceValue('null')).toBeNull();
    expect(coerceValue('42')).toBe(42);
    expect(coerceValue('-0.5')).toBe(-0.5);
    expect(coerceValue('1e-3')).toBe(0.001);
    expect(coerceValue('"quoted"')).toBe('quoted');
    expect(coerceValue('[1, 2, 3]')).toEqual([1, 2, 3]);
    expect(coerceValue('{"k": [true]}')).toEqual({ k: [true] });
  });

  it('should keep text that is not JSON as a string', () => {
    expect(coerceValue('adam.v1')).toBe('adam.v1');
    expect(coerceValue('True')).toBe('True');
    expect(coerceValue('[1, 2')).toBe('[1, 2');
    expect(coerceValue('')).toBe('');
  });

  it('should keep placeholders as strings', () => {
    expect(coerceValue('${hp.lr}')).toBe('${hp.lr}');
  });

  it('should read bare placeholders inside lists and mappings', () => {
    expect(coerceValue('[${a.b}, 2]')).toEqual(['${a.b}', 2]);
    expect(coerceValue('{"x": ${a.b}}')).toEqual({ x: '${a.b}' });
  });

  it('should keep numbers beyond the double range as text', () => {
    expect(coerceValue('1e400')).toBe('1e400');
  });

  it('should keep integers beyond the safe range as text', () => {
    expect(coerceValue('9007199254740993')).toBe('9007199254740993');
    expect(coerceValue('-9007199254740993')).toBe('-9007199254740993');
    expect(coerceValue('9007199254740991')).toBe(9007199254740991);
    expect(coerceValue('9007199254740993.0')).toBe(9007199254740992);
  });

  it('should read back large integers unchanged after rendering', () => {
    const tree = parse('[ids]\nseed = 9007199254740993\n');
    expect(tree).toEqual({ ids: { seed: '9007199254740993' } });
    expect(parse(render(tree))).toEqual(tree);
  });

  it('should read any safe integer back as a number', () => {
    fc.assert(
      fc.property(fc.integer(), (n) => {
        expect(coerceValue(String(n))).toBe(n);
      })
    );
  });

  it('should read any JSON-quoted string back unchanged', () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(coerceValue(JSON.stringify(text))).toBe(text);
      })
    );
  });
});

describe('quoteBarePlaceholders', () => {
  it('should quote placeholders outside strings', () => {
    expect(quoteBarePlaceholders('[${a}, ${b.c}]')).toBe('["${a}", "${b.c}"]');
  });

  it('should leave placeholders inside strings alone', () => {
    expect(quoteBarePlaceholders('["${a}", "x\\"${b}"]')).toBe('["${a}", "x\\"${b}"]');
  });

  it('should leave malformed placeholders alone', () => {
    expect(quoteBarePlaceholders('[${a b}]')).toBe('[${a b}]');
  });
});
