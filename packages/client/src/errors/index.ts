export { ConfigError, DecodeError, PapiError } from './base.js';
export {
  ApiError,
  type ApiErrorEntry,
  type ApiErrorOptions,
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  ConflictError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
} from './http.js';
export { ValidationError } from './validation.js';
