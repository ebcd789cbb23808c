import { PapiError } from './base.js';

/**
 * Structured entry from the `errors` array of a PAPI response
 */
export interface ApiErrorEntry {
  code?: string;
  message?: string;
  field?: string;
}

export interface ApiErrorOptions {
  statusCode?: number;
  retryable?: boolean;
  body?: string;
  errors?: ApiErrorEntry[];
}

/**
 * Network error (connection issues, timeouts)
 * Retryable by default
 */
export class NetworkError extends PapiError {
  constructor(message: string, cause?: Error) {
    super(message, { retryable: true, cause });
  }
}

/**
 * Error response returned by the cluster
 */
export class ApiError extends PapiError {
  /**
   * Raw response body
   */
  public readonly body: string;

  /**
   * Entries of the `errors` array, empty when the body carried none
   */
  public readonly errors: ApiErrorEntry[];

  constructor(message: string, options?: ApiErrorOptions) {
    super(message, {
      retryable: options?.retryable ?? false,
      statusCode: options?.statusCode,
    });
    this.body = options?.body ?? '';
    this.errors = options?.errors ?? [];
  }

  /**
   * Whether any error entry carries the given code
   */
  public hasCode(code: string): boolean {
    return this.errors.some((entry) => entry.code === code);
  }
}

/**
 * Authentication error (login rejected, missing session cookies, 401)
 * Not retryable - requires new credentials
 */
export class AuthenticationError extends ApiError {
  constructor(message = 'Authentication failed', options?: ApiErrorOptions) {
    super(message, {
      ...options,
      retryable: false,
      statusCode: options?.statusCode ?? 401,
    });
  }
}

/**
 * Authorization error (403 Forbidden)
 * Not retryable - requires different permissions
 */
export class AuthorizationError extends ApiError {
  constructor(message = 'Insufficient permissions', options?: ApiErrorOptions) {
    super(message, { ...options, retryable: false, statusCode: 403 });
  }
}

/**
 * Not found error (404 Not Found)
 * Not retryable
 */
export class NotFoundError extends ApiError {
  constructor(resource: string, options?: ApiErrorOptions) {
    super(`Resource not found: ${resource}`, {
      ...options,
      retryable: false,
      statusCode: 404,
    });
  }
}

/**
 * Conflict error (409 Conflict)
 * Not retryable
 */
export class ConflictError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, { ...options, retryable: false, statusCode: 409 });
  }
}

/**
 * Rate limit error (429 Too Many Requests)
 * Retryable after delay
 */
export class RateLimitError extends ApiError {
  /**
   * Number of seconds to wait before retrying (from Retry-After header)
   */
  public readonly retryAfter?: number;

  constructor(
    message = 'Rate limit exceeded',
    retryAfter?: string | number,
    options?: ApiErrorOptions,
  ) {
    super(message, { ...options, retryable: true, statusCode: 429 });

    if (retryAfter !== undefined) {
      this.retryAfter =
        typeof retryAfter === 'string' ? parseInt(retryAfter, 10) : retryAfter;
    }
  }
}

/**
 * Server error (500+)
 * Retryable by default
 */
export class ServerError extends ApiError {
  constructor(message: string, statusCode = 500, options?: ApiErrorOptions) {
    super(message, { ...options, retryable: true, statusCode });
  }
}

/**
 * Bad request error (400)
 * Not retryable - client error
 */
export class BadRequestError extends ApiError {
  constructor(message: string, options?: ApiErrorOptions) {
    super(message, { ...options, retryable: false, statusCode: 400 });
  }
}
