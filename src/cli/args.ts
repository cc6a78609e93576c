/**
 * Flag parsing shared by the cfgtree commands.
 */

import { coerceValue } from '../parser/index.js';
import { setEntry, type ConfigTree } from '../tree/index.js';

/**
 * Error raised for invalid command-line usage.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Options understood by the commands.
 */
export interface CommandOptions {
  /** Non-flag arguments, in order. */
  positionals: string[];
  /** `--interpolate` / `--no-interpolate`; undefined when neither is given. */
  interpolate: boolean | undefined;
  /** `--order a,b`; undefined when not given. */
  order: string[] | undefined;
  /** `--set path=value`, values coerced like configuration values. */
  overrides: ConfigTree;
  /** `--out <file>`; undefined when output goes to stdout. */
  out: string | undefined;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Parses command arguments.
 *
 * Flags taking a value accept both `--flag value` and `--flag=value`.
 *
 * @param args - Arguments following the command name.
 * @returns The parsed options.
 * @throws CliUsageError for unknown flags or missing flag values.
 */
export function parseCommandArgs(args: readonly string[]): CommandOptions {
  const options: CommandOptions = {
    positionals: [],
    interpolate: undefined,
    order: undefined,
    overrides: {},
    out: undefined,
  };

  let index = 0;
  const takeValue = (flag: string, inline: string | undefined): string => {
    if (inline !== undefined) {
      return inline;
    }
    const next = args[index + 1];
    if (next === undefined) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    index += 1;
    return next;
  };

  while (index < args.length) {
    const arg = args[index] ?? '';

    if (!arg.startsWith('--')) {
      options.positionals.push(arg);
      index += 1;
      continue;
    }

    const equals = arg.indexOf('=');
    const flag = equals === -1 ? arg : arg.slice(0, equals);
    const inline = equals === -1 ? undefined : arg.slice(equals + 1);

    switch (flag) {
      case '--interpolate':
        options.interpolate = true;
        break;
      case '--no-interpolate':
        options.interpolate = false;
        break;
      case '--order':
        options.order = splitList(takeValue(flag, inline));
        break;
      case '--out':
        options.out = takeValue(flag, inline);
        break;
      case '--set': {
        const assignment = takeValue(flag, inline);
        const separator = assignment.indexOf('=');
        if (separator <= 0) {
          throw new CliUsageError(`Expected --set path=value, got '${assignment}'`);
        }
        setEntry(
          options.overrides,
          assignment.slice(0, separator).trim(),
          coerceValue(assignment.slice(separator + 1).trim())
        );
        break;
      }
      default:
        throw new CliUsageError(`Unknown option: ${flag}`);
    }
    index += 1;
  }

  return options;
}
