/**
 * Transformation Errors
 *
 * Error taxonomy for the table transformation core. Every error raised by a
 * transform extends TransformError so callers (route handlers, the CLI) can
 * tell bad input apart from unexpected failures with a single instanceof check.
 *
 * Division by zero is deliberately absent from this list: growth rates,
 * percentages and percentile ranks return `null` for a zero denominator
 * instead of raising.
 */

/**
 * Discriminator for the kind of transformation failure.
 */
export type TransformErrorType =
  | 'malformed_date'
  | 'unsupported_method'
  | 'invalid_parameter';

/**
 * Base class for all errors raised by the transformation core.
 */
export class TransformError extends Error {
  /** The kind of failure */
  readonly type: TransformErrorType;

  constructor(message: string, type: TransformErrorType) {
    super(message);
    this.name = 'TransformError';
    this.type = type;
  }
}

/**
 * A date cell (or a range bound) could not be parsed as a calendar date.
 *
 * @example
 * ```typescript
 * try {
 *   createTable([{ date: 'next tuesday', streams: 10 }]);
 * } catch (err) {
 *   if (err instanceof MalformedDateError) {
 *     console.error(`Bad ${err.field}: ${String(err.value)}`);
 *   }
 * }
 * ```
 */
export class MalformedDateError extends TransformError {
  /** The value that failed to parse */
  readonly value: unknown;
  /** The field (or bound name) the value came from */
  readonly field: string;

  constructor(value: unknown, field: string) {
    super(`Field '${field}' contains a malformed date: ${JSON.stringify(value) ?? String(value)}`, 'malformed_date');
    this.name = 'MalformedDateError';
    this.value = value;
    this.field = field;
  }
}

/**
 * An unknown method name was passed to a transform that selects behaviour
 * by name (forecast methods, aggregation functions).
 */
export class UnsupportedMethodError extends TransformError {
  /** The rejected method name */
  readonly method: string;

  constructor(method: string, supported: readonly string[]) {
    super(
      `Method '${method}' is not supported (expected one of: ${supported.join(', ')})`,
      'unsupported_method'
    );
    this.name = 'UnsupportedMethodError';
    this.method = method;
  }
}

/**
 * A numeric parameter (window size, forecast horizon) is out of range.
 */
export class InvalidParameterError extends TransformError {
  readonly parameter: string;

  constructor(parameter: string, reason: string) {
    super(`Invalid ${parameter}: ${reason}`, 'invalid_parameter');
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
  }
}
