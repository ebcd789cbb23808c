/**
 * Path of the session resource, used for login (POST) and logout (DELETE)
 */
export const SESSION_PATH = 'session/1/session';

/**
 * Services requested when a session is created
 */
export const SESSION_SERVICES = ['platform', 'namespace'] as const;

export const DEFAULT_TIMEOUT_SECONDS = 120;

export const DEFAULT_MAX_REAUTH_ATTEMPTS = 1;

/**
 * Upper bound on pages fetched by a single send()
 */
export const MAX_PAGES = 10_000;

/**
 * Platform API path used until the cluster reports its latest version
 */
export const DEFAULT_PLATFORM_PATH = 'platform/10';

/**
 * Configuration options for PapiSession
 */
export interface SessionConfig {
  /**
   * Cluster endpoint including protocol and port
   * Example: 'https://cluster.example.com:8080'
   */
  endpoint?: string;

  user?: string;

  password?: string;

  /**
   * Skip TLS certificate verification
   * @default false
   */
  ignoreCert?: boolean;

  /**
   * Request timeout in seconds, covering the response body; 0 disables it
   * @default 120
   */
  timeout?: number;

  /**
   * Re-authentications a single send() may perform after a 401
   * @default 1
   */
  maxReauthAttempts?: number;
}

/**
 * Settings that can be changed on a live session with configure()
 */
export type SessionSettings = Required<
  Pick<SessionConfig, 'endpoint' | 'user' | 'password' | 'ignoreCert' | 'timeout'>
>;

/**
 * Options for PapiClient.connect()
 */
export interface ConnectOptions {
  endpoint: string;
  user: string;
  password: string;
  /**
   * @default false
   */
  ignoreCert?: boolean;
}
