import {
  DEFAULT_MAX_REAUTH_ATTEMPTS,
  DEFAULT_TIMEOUT_SECONDS,
  SESSION_PATH,
  SESSION_SERVICES,
  type SessionConfig,
  type SessionSettings,
} from './config.js';
import { AuthenticationError, ConfigError } from './errors/index.js';
import type {
  HttpMethod,
  JsonObject,
  RawResponse,
  RequestOptions,
  RequestPath,
} from './types/common.js';
import { extractSessionTokens } from './utils/cookies.js';
import {
  assembleHeaders,
  buildUrl,
  createHttpClient,
  dispatch,
  type HttpClient,
  isSuccessStatus,
  joinPath,
  parseErrorEntries,
} from './utils/http.js';
import { decodeText } from './utils/json.js';
import { collectPages, type PageFetcher } from './utils/pagination.js';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Cookie-authenticated session against a cluster's Platform API
 *
 * A session is either disconnected (no HTTP client, both tokens empty) or
 * connected (HTTP client held, both tokens set). It is not safe to share
 * between overlapping calls; serialize access to one instance.
 *
 * @example
 * ```typescript
 * const session = new PapiSession({
 *   endpoint: 'https://cluster.example.com:8080',
 *   user: 'api_user',
 *   password: 'secret',
 *   ignoreCert: true,
 * });
 *
 * await session.connect();
 * const version = await session.send('GET', 'platform/latest');
 * await session.disconnect();
 * ```
 */
export class PapiSession {
  private endpointUrl: string;
  private userName: string;
  private userPassword: string;
  private skipCertCheck: boolean;
  private timeoutSeconds: number;
  private readonly maxReauthAttempts: number;

  private http?: HttpClient;
  private session = '';
  private csrf = '';
  private reauthCount = 0;

  constructor(config: SessionConfig = {}) {
    this.endpointUrl = config.endpoint ?? '';
    this.userName = config.user ?? '';
    this.userPassword = config.password ?? '';
    this.skipCertCheck = config.ignoreCert ?? false;
    this.timeoutSeconds = config.timeout ?? DEFAULT_TIMEOUT_SECONDS;
    this.maxReauthAttempts =
      config.maxReauthAttempts ?? DEFAULT_MAX_REAUTH_ATTEMPTS;
  }

  get endpoint(): string {
    return this.endpointUrl;
  }

  get user(): string {
    return this.userName;
  }

  get ignoreCert(): boolean {
    return this.skipCertCheck;
  }

  /**
   * Request timeout in seconds
   */
  get timeout(): number {
    return this.timeoutSeconds;
  }

  get sessionToken(): string {
    return this.session;
  }

  get csrfToken(): string {
    return this.csrf;
  }

  get isConnected(): boolean {
    return this.http !== undefined;
  }

  /**
   * Automatic re-authentications since the last connect()
   */
  get reauthAttempts(): number {
    return this.reauthCount;
  }

  /**
   * Set the endpoint, e.g. 'https://cluster.example.com:8080'
   * Takes effect on the next connect()
   * @returns the previous endpoint
   */
  setEndpoint(endpoint: string): string {
    const previous = this.endpointUrl;
    this.endpointUrl = endpoint;
    return previous;
  }

  setUser(user: string): string {
    const previous = this.userName;
    this.userName = user;
    return previous;
  }

  setPassword(password: string): string {
    const previous = this.userPassword;
    this.userPassword = password;
    return previous;
  }

  setIgnoreCert(ignoreCert: boolean): boolean {
    const previous = this.skipCertCheck;
    this.skipCertCheck = ignoreCert;
    return previous;
  }

  /**
   * Set the request timeout in seconds, or 0 for none
   * Takes effect on the next connect(), which rejects a negative value
   */
  setConnTimeout(timeout: number): number {
    const previous = this.timeoutSeconds;
    this.timeoutSeconds = timeout;
    return previous;
  }

  /**
   * Apply several settings at once
   * @returns the previous values of the settings that were given
   */
  configure(settings: Partial<SessionSettings>): Partial<SessionSettings> {
    const previous: Partial<SessionSettings> = {};

    if (settings.endpoint !== undefined) {
      previous.endpoint = this.setEndpoint(settings.endpoint);
    }
    if (settings.user !== undefined) {
      previous.user = this.setUser(settings.user);
    }
    if (settings.password !== undefined) {
      previous.password = this.setPassword(settings.password);
    }
    if (settings.ignoreCert !== undefined) {
      previous.ignoreCert = this.setIgnoreCert(settings.ignoreCert);
    }
    if (settings.timeout !== undefined) {
      previous.timeout = this.setConnTimeout(settings.timeout);
    }

    return previous;
  }

  /**
   * Log in and store the session and CSRF tokens
   * Any existing session is closed first, so this always yields a fresh one
   * @throws {ConfigError} if the endpoint or timeout is invalid
   * @throws {AuthenticationError} if the login is rejected or a cookie is missing
   * @throws {NetworkError} if the login request cannot be sent
   */
  async connect(): Promise<void> {
    try {
      await this.disconnect();
    } catch (error) {
      console.warn(
        `[connect] Failed to close the previous session: ${describeError(error)}`,
      );
    }

    const url = buildUrl(this.endpointUrl, SESSION_PATH);
    const http = createHttpClient({
      ignoreCert: this.skipCertCheck,
      timeout: this.timeoutSeconds,
    });

    try {
      const response = await dispatch(http, {
        method: 'POST',
        url,
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          username: this.userName,
          password: this.userPassword,
          services: SESSION_SERVICES,
        }),
      });

      const { sessionToken, csrfToken } = this.readLoginResponse(response);
      this.http = http;
      this.session = sessionToken;
      this.csrf = csrfToken;
      this.reauthCount = 0;
    } catch (error) {
      await http.close();
      throw error;
    }
  }

  private readLoginResponse(response: RawResponse): {
    sessionToken: string;
    csrfToken: string;
  } {
    if (!isSuccessStatus(response.status)) {
      const body = decodeText(response.body);
      throw new AuthenticationError(
        `Unable to create a session (${response.status}): ${body}`,
        { statusCode: response.status, body, errors: parseErrorEntries(body) },
      );
    }

    const { sessionToken, csrfToken } = extractSessionTokens(
      response.headers.getSetCookie(),
    );

    if (!sessionToken) {
      throw new AuthenticationError('No session token found in login response', {
        statusCode: response.status,
      });
    }
    if (!csrfToken) {
      throw new AuthenticationError('No CSRF token found in login response', {
        statusCode: response.status,
      });
    }

    return { sessionToken, csrfToken };
  }

  /**
   * Delete the session on the cluster and release the HTTP client
   * Local state is always cleared, even when the delete request fails;
   * that failure is still thrown afterwards. Safe to call when not connected.
   */
  async disconnect(): Promise<void> {
    const http = this.http;
    if (!http) {
      return;
    }

    try {
      await this.sendRaw('DELETE', SESSION_PATH);
    } finally {
      this.http = undefined;
      this.session = '';
      this.csrf = '';
      await http.close();
    }
  }

  /**
   * Disconnect, ignoring failures, then connect
   */
  async reconnect(): Promise<void> {
    try {
      await this.disconnect();
    } catch (error) {
      console.warn(`[reconnect] Disconnect failed: ${describeError(error)}`);
    }
    await this.connect();
  }

  /**
   * Send a single request and return the unprocessed response
   * @throws {ConfigError} if the session is not connected or the endpoint is invalid
   * @throws {NetworkError} on transport failures
   */
  async sendRaw(
    method: HttpMethod,
    path: RequestPath,
    options: RequestOptions = {},
  ): Promise<RawResponse> {
    const http = this.http;
    if (!http) {
      throw new ConfigError('Session is not connected: call connect() first');
    }

    return dispatch(http, {
      method,
      url: buildUrl(this.endpointUrl, path, options.query),
      headers: assembleHeaders(options.headers, {
        endpoint: this.endpointUrl,
        sessionToken: this.session,
        csrfToken: this.csrf,
      }),
      body: options.body,
    });
  }

  /**
   * Send a request, following resume tokens and merging every page into one
   * object
   *
   * A 401 makes the session log in again and repeat the whole call with the
   * original arguments, at most `maxReauthAttempts` times per call.
   *
   * @returns the merged JSON object, or undefined when the response has no body
   * @throws {AuthenticationError} when the cluster still answers 401 after re-authenticating
   */
  async send(
    method: HttpMethod,
    path: RequestPath,
    options: RequestOptions = {},
  ): Promise<JsonObject | undefined> {
    const fetchPage: PageFetcher = (query) =>
      this.sendRaw(method, path, { ...options, query });
    let unauthorized: AuthenticationError | undefined;

    for (let attempt = 0; attempt <= this.maxReauthAttempts; attempt++) {
      if (unauthorized) {
        await this.reconnect();
        this.reauthCount++;
      }

      try {
        return await collectPages(fetchPage, options.query);
      } catch (error) {
        if (!(error instanceof AuthenticationError)) {
          throw error;
        }
        unauthorized = error;
      }
    }

    console.error(
      `[send] Automatic re-authentication failed: ${method} ${joinPath(path)}`,
    );
    throw unauthorized ?? new AuthenticationError();
  }
}

/**
 * Create a disconnected session, optionally pointed at an endpoint
 */
export function createSession(endpoint?: string): PapiSession {
  return new PapiSession({ endpoint });
}
