/**
 * Error hierarchy for configuration parsing, interpolation and rendering.
 *
 * @packageDocumentation
 */

/**
 * Base class for every error raised by the configuration engine.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error raised when configuration text does not have a valid structure.
 */
export class ConfigParseError extends ConfigError {
  /** 1-based line number of the offending line, if known. */
  public readonly line: number | undefined;
  /** The original error that caused the parse failure, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param line - 1-based line number of the offending line.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, line?: number, cause?: Error) {
    super(line === undefined ? message : `Line ${String(line)}: ${message}`);
    this.name = 'ConfigParseError';
    this.line = line;
    this.cause = cause;
  }
}

/**
 * Error raised when a placeholder names a path that does not exist.
 */
export class UnresolvedReferenceError extends ConfigError {
  /** The dotted path the placeholder refers to. */
  public readonly reference: string;
  /** Location of the value that holds the placeholder. */
  public readonly location: string;

  constructor(reference: string, location: string) {
    super(`Cannot resolve '\${${reference}}' used at '${location}': no such setting`);
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
    this.location = location;
  }
}

/**
 * Error raised when resolving a placeholder leads back to a path that is
 * still being resolved.
 */
export class InterpolationCycleError extends ConfigError {
  /** Dotted paths in resolution order, ending with the repeated path. */
  public readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Circular reference: ${cycle.join(' -> ')}`);
    this.name = 'InterpolationCycleError';
    this.cycle = cycle;
  }
}

/**
 * Error raised when a dotted-path override cannot be applied.
 */
export class ConfigOverrideError extends ConfigError {
  /** The dotted path of the override. */
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid override '${path}': ${message}`);
    this.name = 'ConfigOverrideError';
    this.path = path;
  }
}

/**
 * Error raised when a tree holds something the text format cannot express.
 */
export class ConfigSerializeError extends ConfigError {
  /** Location of the value that cannot be written. */
  public readonly location: string;

  constructor(location: string, message: string) {
    super(`Cannot serialize '${location}': ${message}`);
    this.name = 'ConfigSerializeError';
    this.location = location;
  }
}
