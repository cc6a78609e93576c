/**
 * Value coercion for the right-hand side of `key = value` lines.
 *
 * Values are read as JSON literals. Anything that is not valid JSON is kept
 * as the raw text, so bare words and placeholders such as `${paths.train}`
 * come through as strings.
 *
 * @packageDocumentation
 */

import { fromJson, PLACEHOLDER_PATTERN, type ConfigValue } from '../tree/index.js';

const INTEGER_LITERAL = /^-?\d+$/;

/**
 * Wraps bare placeholders that appear inside a list or mapping literal in
 * double quotes, leaving the contents of JSON strings untouched.
 *
 * `[${a.b}, 2]` becomes `["${a.b}", 2]`.
 *
 * @param text - A list or mapping literal.
 * @returns The literal with every bare placeholder quoted.
 */
export function quoteBarePlaceholders(text: string): string {
  let result = '';
  let inString = false;
  let index = 0;

  while (index < text.length) {
    const char = text.charAt(index);

    if (inString) {
      result += char;
      if (char === '\\' && index + 1 < text.length) {
        result += text.charAt(index + 1);
        index += 2;
        continue;
      }
      if (char === '"') {
        inString = false;
      }
      index += 1;
      continue;
    }

    if (char === '"') {
      inString = true;
      result += char;
      index += 1;
      continue;
    }

    if (char === '$' && text.charAt(index + 1) === '{') {
      const end = text.indexOf('}', index);
      if (end !== -1) {
        const candidate = text.slice(index, end + 1);
        if (PLACEHOLDER_PATTERN.test(candidate)) {
          result += `"${candidate}"`;
          index = end + 1;
          continue;
        }
      }
    }

    result += char;
    index += 1;
  }

  return result;
}

/**
 * Converts raw value text into a typed configuration value.
 *
 * @param raw - The text after `=`, already trimmed.
 * @returns The parsed JSON value, or `raw` itself when it is not valid JSON,
 * holds a number outside the double range, or is an integer beyond
 * `Number.MAX_SAFE_INTEGER` in magnitude.
 *
 * @example
 * ```typescript
 * coerceValue('true');        // true
 * coerceValue('[1, 2, 3]');   // [1, 2, 3]
 * coerceValue('not json');    // 'not json'
 * coerceValue('${hp.lr}');    // '${hp.lr}'
 * coerceValue('9007199254740993'); // '9007199254740993'
 * ```
 */
export function coerceValue(raw: string): ConfigValue {
  const source = raw.startsWith('[') || raw.startsWith('{') ? quoteBarePlaceholders(raw) : raw;
  let value: ConfigValue;
  try {
    value = fromJson(JSON.parse(source));
  } catch {
    return raw;
  }
  // Integers a double cannot hold exactly stay as text instead of being rounded.
  if (typeof value === 'number' && INTEGER_LITERAL.test(raw) && !Number.isSafeInteger(value)) {
    return raw;
  }
  return value;
}
