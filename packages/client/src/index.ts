/**
 * @papi-lite/client - TypeScript client for the cluster Platform API
 *
 * Handles session login and logout, re-authentication after expiry and
 * merges paged responses into a single result.
 *
 * @packageDocumentation
 */

// Main client
export { PapiClient } from './client.js';
export { createSession, PapiSession } from './session.js';

// Configuration
export {
  type ConnectOptions,
  DEFAULT_MAX_REAUTH_ATTEMPTS,
  DEFAULT_PLATFORM_PATH,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_PAGES,
  SESSION_PATH,
  type SessionConfig,
  type SessionSettings,
} from './config.js';
// Errors
export {
  ApiError,
  type ApiErrorEntry,
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  ConfigError,
  ConflictError,
  DecodeError,
  NetworkError,
  NotFoundError,
  PapiError,
  RateLimitError,
  ServerError,
  ValidationError,
} from './errors/index.js';
// Resources
export { DEFAULT_ZONE, MEMBER_CONFLICT_CODE } from './resources/index.js';
// Types
export type {
  // Zones
  AccessZone,
  CreatedUser,
  // S3
  CreateS3KeyOptions,
  CreateUser,
  HttpMethod,
  // Common
  JsonObject,
  JsonPrimitive,
  JsonValue,
  Persona,
  QueryParams,
  RawResponse,
  RequestBody,
  RequestHeaders,
  RequestOptions,
  RequestPath,
  S3Key,
  // Users
  User,
} from './types/index.js';
// Helpers
export {
  assembleHeaders,
  buildUrl,
  extractCookieToken,
  extractSessionTokens,
  mergePage,
  stripPageMetadata,
} from './utils/index.js';
