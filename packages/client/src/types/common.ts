export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

/**
 * Request path relative to the endpoint
 * A list of segments is joined with '/'
 */
export type RequestPath = string | readonly string[];

/**
 * Raw request body, sent as-is
 */
export type RequestBody = string | Uint8Array;

export type QueryParams = Record<string, string>;

export type RequestHeaders = Record<string, string>;

export interface RequestOptions {
  query?: QueryParams;
  body?: RequestBody;
  /**
   * Extra headers; these take precedence over the session defaults
   */
  headers?: RequestHeaders;
}

/**
 * Unprocessed response returned by PapiSession.sendRaw()
 */
export interface RawResponse {
  status: number;
  headers: Headers;
  body: Uint8Array;
}

