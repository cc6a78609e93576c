/**
 * Structured logging for the CLI and file helpers.
 *
 * Each entry is written to stderr as a single JSON line.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: detailed diagnostic information
 * - `info`: normal operation, such as a file being written
 * - `warn`: something was discarded or ignored but work continued
 * - `error`: the operation failed
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Every log level, from least to most severe.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'] as const;

/**
 * Checks if a string names a log level.
 *
 * @param value - The value to check.
 * @returns True if the value is a LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Name of the component that produced the entry.
   * @example "cli.merge"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "file_written"
   */
  readonly event: string;

  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;

  /**
   * Entries below this level are dropped.
   * @defaultValue 'warn'
   */
  readonly level?: LogLevel | undefined;
}

/**
 * Serializes an entry, falling back to a marker when the data cannot be
 * turned into JSON (circular structures, BigInt values).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Leveled logger that writes JSON lines to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'cli.render', level: 'debug' });
 * logger.info('file_read', { path: 'train.cfg', bytes: 512 });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly threshold: number;

  /**
   * Creates a new Logger instance.
   * @param options - Component name and minimum level.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'warn');
  }

  /**
   * Creates a logger for a sub-component with the same minimum level.
   *
   * @param component - Name of the sub-component.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({
      component: `${this.component}.${component}`,
      level: LOG_LEVELS[this.threshold],
    });
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    process.stderr.write(serializeEntry(entry) + '\n');
  }
}
