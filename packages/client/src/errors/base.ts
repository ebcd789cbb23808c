/**
 * Base error class for all PAPI client errors
 */
export class PapiError extends Error {
  /**
   * Whether this error is safe to retry
   */
  public readonly retryable: boolean;

  /**
   * HTTP status code if applicable
   */
  public readonly statusCode?: number;

  /**
   * Original error cause
   */
  public readonly cause?: Error;

  constructor(
    message: string,
    options?: {
      retryable?: boolean;
      statusCode?: number;
      cause?: Error;
    },
  ) {
    super(message);
    this.name = this.constructor.name;
    this.retryable = options?.retryable ?? false;
    this.statusCode = options?.statusCode;
    this.cause = options?.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Configuration error (malformed endpoint, session not connected)
 * Not retryable
 */
export class ConfigError extends PapiError {
  constructor(message: string, cause?: Error) {
    super(message, { retryable: false, cause });
  }
}

/**
 * Response body could not be decoded as a JSON object
 * Not retryable
 */
export class DecodeError extends PapiError {
  constructor(message: string, cause?: Error) {
    super(message, { retryable: false, cause });
  }
}
