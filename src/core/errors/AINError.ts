/**
 * Error handling for the AIN algebra
 *
 * Every failure carries a structured code so callers can branch on the kind of
 * violated precondition rather than on message text.
 */

/**
 * Error codes covering every failure the library raises
 */
export enum ErrorCode {
  // Construction
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  // Operator preconditions
  DOMAIN_ERROR = 'DOMAIN_ERROR',
  COMPLEX_RESULT = 'COMPLEX_RESULT',
  RANGE_ERROR = 'RANGE_ERROR',

  // User input
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error class for the AIN algebra with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new AINError(
 *   ErrorCode.DOMAIN_ERROR,
 *   'Logarithm requires a positive lower bound',
 *   { lower: -1 }
 * );
 * ```
 */
export class AINError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AINError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AINError);
    }
  }

  /**
   * Code, message and context in one line
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

export function isAINError(error: unknown): error is AINError {
  return error instanceof AINError;
}

/**
 * Wrap an unknown thrown value as an AINError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): AINError {
  if (isAINError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new AINError(code, message, context);
}
