/**
 * Shared fixtures for command tests.
 */

import { vi } from 'vitest';
import { DEFAULT_SETTINGS, type Settings } from '../../settings/index.js';
import { Logger, type LogLevel } from '../../utils/logger.js';
import type { CliContext } from '../types.js';

/**
 * Builds a command context with default settings.
 */
export function createTestContext(
  args: string[],
  settings: Settings = DEFAULT_SETTINGS,
  level: LogLevel = 'error'
): CliContext {
  return { args, settings, logger: new Logger({ component: 'test', level }) };
}

/**
 * Replaces a stream's write method and collects what is written.
 *
 * @returns The collected chunks and a function restoring the stream.
 */
export function captureStream(stream: NodeJS.WriteStream): {
  output: string[];
  restore: () => void;
} {
  const output: string[] = [];
  const originalWrite = stream.write.bind(stream);
  stream.write = vi.fn((chunk: string | Uint8Array): boolean => {
    output.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
    return true;
  }) as typeof stream.write;
  return {
    output,
    restore: () => {
      stream.write = originalWrite;
    },
  };
}
