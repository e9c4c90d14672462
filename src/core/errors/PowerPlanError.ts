/**
 * Core error handling for powerplan
 *
 * Every failure the library raises is a PowerPlanError carrying:
 * - A structured error code for categorization
 * - A context object for debugging
 * - A proper stack trace
 */

/**
 * Error codes covering all error categories in powerplan
 */
export enum ErrorCode {
  // Parameter errors
  INVALID_PARAMETER = 'INVALID_PARAMETER',

  // Caller errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export type ErrorContext = Record<string, unknown>;

/**
 * Base error class with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new PowerPlanError(
 *   ErrorCode.INVALID_CONFIG,
 *   'curvePoints must be an integer of at least 2',
 *   { curvePoints: 1 }
 * );
 * ```
 */
export class PowerPlanError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = 'PowerPlanError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Formatted representation including code and context
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }
}

/**
 * A single test parameter failed validation.
 *
 * `field` names the offending TestParameters property; `reason` says what was
 * wrong with it. Raised before any arithmetic runs.
 */
export class InvalidParameterError extends PowerPlanError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
    value?: unknown
  ) {
    super(ErrorCode.INVALID_PARAMETER, `Invalid ${field}: ${reason}`, { field, value });
    this.name = 'InvalidParameterError';
  }
}

/**
 * Type guard to check if an error is a PowerPlanError
 */
export function isPowerPlanError(error: unknown): error is PowerPlanError {
  return error instanceof PowerPlanError;
}

export function isInvalidParameterError(error: unknown): error is InvalidParameterError {
  return error instanceof InvalidParameterError;
}

/**
 * Wrap an unknown thrown value as a PowerPlanError.
 * Useful for catch blocks where the error type is unknown.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.INTERNAL_ERROR
): PowerPlanError {
  if (isPowerPlanError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context: ErrorContext =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new PowerPlanError(code, message, context);
}
