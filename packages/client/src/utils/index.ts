export {
  CSRF_COOKIE,
  extractCookieToken,
  extractSessionTokens,
  SESSION_COOKIE,
  type SessionTokens,
} from './cookies.js';
export {
  assembleHeaders,
  buildUrl,
  createHttpClient,
  dispatch,
  type HttpClient,
  isSuccessStatus,
  joinPath,
  parseErrorEntries,
  toApiError,
} from './http.js';
export { decodeJsonObject, decodeText, isJsonObject } from './json.js';
export {
  absorbPage,
  collectPages,
  mergePage,
  type PageFetcher,
  readResumeToken,
  stripPageMetadata,
} from './pagination.js';
