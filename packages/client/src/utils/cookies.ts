export const SESSION_COOKIE = 'isisessid';
export const CSRF_COOKIE = 'isicsrf';

export interface SessionTokens {
  sessionToken?: string;
  csrfToken?: string;
}

/**
 * Extract the value of a cookie from a single Set-Cookie header value
 *
 * @example
 * ```typescript
 * extractCookieToken('isisessid=abc123; path=/; HttpOnly', 'isisessid'); // 'abc123'
 * ```
 */
export function extractCookieToken(
  setCookie: string,
  name: string,
): string | undefined {
  const match = new RegExp(`(?:^|[\\s;,])${name}=([^;]+)`).exec(setCookie);
  const token = match?.[1].trim();
  return token ? token : undefined;
}

/**
 * Scan every Set-Cookie header for the session and CSRF cookies
 * The first header carrying a cookie wins
 */
export function extractSessionTokens(
  setCookies: readonly string[],
): SessionTokens {
  const tokens: SessionTokens = {};

  for (const header of setCookies) {
    tokens.sessionToken ??= extractCookieToken(header, SESSION_COOKIE);
    tokens.csrfToken ??= extractCookieToken(header, CSRF_COOKIE);
  }

  return tokens;
}
