// Error types raised by the result package.
// Domain validation failures are never thrown; they are collected as ErrorMessage data.

/**
 * Root of the errors this package throws. These signal misuse or bad input around
 * a Result, never a failed domain check. `code` and `statusCode` let callers map
 * them onto an API response.
 */
export abstract class ResultError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Raised by Result#get() when no success value was ever set
 */
export class NoSuccessValueError extends ResultError {
  static readonly MESSAGE = 'Result has no success value.';

  readonly code = 'NO_SUCCESS_VALUE';
  readonly statusCode = 500;

  constructor(target?: string | null) {
    super(NoSuccessValueError.MESSAGE, { target: target ?? null });
  }
}

/**
 * Configuration file exists but cannot be parsed or validated
 */
export class ConfigurationError extends ResultError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = 500;

  constructor(message: string, public readonly path?: string, context?: Record<string, unknown>) {
    super(message, { ...context, path });
  }
}

/**
 * Inbound error report does not match the report schema
 */
export class ReportFormatError extends ResultError {
  readonly code = 'REPORT_FORMAT_ERROR';
  readonly statusCode = 400;
}
