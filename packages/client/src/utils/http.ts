import ky, { type KyInstance, TimeoutError } from 'ky';
import { Agent } from 'undici';
import {
  ApiError,
  type ApiErrorEntry,
  AuthenticationError,
  AuthorizationError,
  BadRequestError,
  ConfigError,
  ConflictError,
  NetworkError,
  NotFoundError,
  RateLimitError,
  ServerError,
} from '../errors/index.js';
import { errorEnvelopeSchema } from '../schemas/common.js';
import type {
  HttpMethod,
  QueryParams,
  RawResponse,
  RequestBody,
  RequestHeaders,
  RequestPath,
} from '../types/common.js';
import { SESSION_COOKIE } from './cookies.js';
import { decodeText } from './json.js';

/**
 * HTTP client owned by a connected session
 */
export interface HttpClient {
  readonly ky: KyInstance;
  /**
   * Deadline for a whole exchange in milliseconds, body included
   * false when requests may take as long as they need
   */
  readonly timeout: number | false;
  /**
   * Release pooled connections
   */
  close(): Promise<void>;
}

export interface HttpClientOptions {
  ignoreCert: boolean;
  /**
   * Timeout in seconds, 0 for none
   */
  timeout: number;
}

export interface DispatchRequest {
  method: HttpMethod;
  url: string;
  headers: RequestHeaders;
  body?: RequestBody;
}

/**
 * Values the default headers are built from
 */
export interface HeaderContext {
  endpoint: string;
  sessionToken: string;
  csrfToken: string;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status <= 299;
}

/**
 * Create a ky instance backed by its own undici connection pool
 * Retries are disabled: the session handles 401 re-authentication itself.
 * undici's own header and body timers are off; `dispatch` bounds each
 * exchange with the configured timeout instead.
 * @throws {ConfigError} if the timeout is negative or not a number
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  if (!Number.isFinite(options.timeout) || options.timeout < 0) {
    throw new ConfigError(
      `Invalid timeout ${options.timeout}: expected seconds, or 0 for none`,
    );
  }

  const timeout = options.timeout > 0 ? options.timeout * 1000 : false;
  const agent = new Agent({
    connect: {
      rejectUnauthorized: !options.ignoreCert,
      timeout: timeout === false ? 0 : timeout,
    },
    headersTimeout: 0,
    bodyTimeout: 0,
  });

  const instance = ky.create({
    timeout,
    retry: 0,
    throwHttpErrors: false,
    fetch: (input, init) =>
      globalThis.fetch(input, Object.assign({}, init, { dispatcher: agent })),
  });

  return {
    ky: instance,
    timeout,
    close: () => agent.close(),
  };
}

export function joinPath(path: RequestPath): string {
  return typeof path === 'string' ? path : path.join('/');
}

/**
 * Join the endpoint, a path and a query into a request URL
 * Query keys are encoded in sorted order
 * @throws {ConfigError} if the endpoint is not an absolute URL
 */
export function buildUrl(
  endpoint: string,
  path: RequestPath,
  query?: QueryParams,
): string {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigError(
      `Invalid endpoint "${endpoint}": expected protocol, host and port`,
      error instanceof Error ? error : undefined,
    );
  }

  const joined = joinPath(path);
  const base = url.pathname.endsWith('/') ? url.pathname : `${url.pathname}/`;
  url.pathname = base + joined.replace(/^\/+/, '');

  const searchParams = new URLSearchParams();
  for (const key of Object.keys(query ?? {}).sort()) {
    searchParams.append(key, query?.[key] ?? '');
  }
  url.search = searchParams.toString();

  return url.toString();
}

/**
 * Merge caller headers with the session defaults
 * Caller headers win; a default is only added when no header with the exact
 * same name was supplied
 */
export function assembleHeaders(
  headers: RequestHeaders | undefined,
  context: HeaderContext,
): RequestHeaders {
  const assembled: RequestHeaders = { ...headers };
  const defaults: RequestHeaders = {
    Accept: 'application/json',
    Cookie: `${SESSION_COOKIE}=${context.sessionToken}`,
    'Content-Type': 'application/json',
    Referer: context.endpoint,
    'X-CSRF-Token': context.csrfToken,
  };

  for (const [name, value] of Object.entries(defaults)) {
    if (!Object.hasOwn(assembled, name)) {
      assembled[name] = value;
    }
  }

  return assembled;
}

/**
 * Issue a request and read the whole body
 * The client's timeout covers sending, the response headers and the body.
 * @throws {NetworkError} on timeouts and transport failures
 */
export async function dispatch(
  client: HttpClient,
  request: DispatchRequest,
): Promise<RawResponse> {
  const deadline =
    client.timeout === false ? undefined : AbortSignal.timeout(client.timeout);

  try {
    const response = await client.ky(request.url, {
      method: request.method,
      headers: request.headers,
      body: toBodyInit(request.body),
      signal: deadline,
    });
    const body = new Uint8Array(await response.arrayBuffer());

    return { status: response.status, headers: response.headers, body };
  } catch (error) {
    if (error instanceof TimeoutError || deadline?.aborted) {
      throw new NetworkError(
        `Request timed out: ${request.method} ${request.url}`,
        error instanceof Error ? error : undefined,
      );
    }

    const cause = error instanceof Error ? error : undefined;
    throw new NetworkError(
      `Request failed: ${request.method} ${request.url}: ${cause?.message ?? String(error)}`,
      cause,
    );
  }
}

// slice() copies into a fresh ArrayBuffer, which BodyInit requires
function toBodyInit(body: RequestBody | undefined) {
  if (body === undefined || typeof body === 'string') {
    return body;
  }
  return body.slice();
}

/**
 * Read the `errors` entries of an error envelope, if the body holds one
 */
export function parseErrorEntries(body: string): ApiErrorEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    // Not JSON: the raw body is all the detail there is
    return [];
  }

  const result = errorEnvelopeSchema.safeParse(parsed);
  return result.success ? result.data.errors : [];
}

/**
 * Map a non-2xx response to the matching ApiError subclass
 */
export function toApiError(response: RawResponse): ApiError {
  const { status } = response;
  const body = decodeText(response.body);
  const errors = parseErrorEntries(body);
  const options = { statusCode: status, body, errors };

  const detail =
    errors.find((entry) => entry.message)?.message ||
    body ||
    `HTTP ${status} error`;
  const message = `Non 2xx response received (${status}): ${detail}`;

  switch (status) {
    case 400:
      return new BadRequestError(message, options);
    case 401:
      return new AuthenticationError(message, options);
    case 403:
      return new AuthorizationError(message, options);
    case 404:
      return new NotFoundError(detail, options);
    case 409:
      return new ConflictError(message, options);
    case 429: {
      const retryAfter = response.headers.get('Retry-After');
      return new RateLimitError(message, retryAfter ?? undefined, options);
    }
    default:
      if (status >= 500) {
        return new ServerError(message, status, options);
      }
      return new ApiError(message, options);
  }
}
