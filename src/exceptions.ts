/**
 * Exception types raised by the benchmark harness.
 *
 * Only input, configuration and output problems surface as exceptions. Failures of an
 * individual model query are recorded as outcomes and never reach these classes.
 */

/**
 * Base class for all harness errors.
 */
export class BenchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BenchError';
  }
}

/**
 * Raised when the test-case file cannot be read or contains a malformed record.
 */
export class DatasetError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetError';
  }
}

/**
 * Raised when a model catalog or inference setting is invalid.
 */
export class ConfigurationError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when a result artifact cannot be written.
 */
export class OutputError extends BenchError {
  /** Path of the artifact that failed to write. */
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutputError';
    this.path = path;
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
