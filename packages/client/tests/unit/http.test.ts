import { describe, expect, it } from 'vitest';
import {
  ApiError,
  AuthenticationError,
  BadRequestError,
  ConfigError,
  ConflictError,
  NotFoundError,
  RateLimitError,
  ServerError,
} from '../../src/errors/index.js';
import type { RawResponse } from '../../src/types/common.js';
import {
  assembleHeaders,
  buildUrl,
  createHttpClient,
  isSuccessStatus,
  parseErrorEntries,
  toApiError,
} from '../../src/utils/http.js';

const context = {
  endpoint: 'https://cluster.example.com:8080',
  sessionToken: 'session-1',
  csrfToken: 'csrf-1',
};

function rawResponse(
  status: number,
  body: string,
  headers: Record<string, string> = {},
): RawResponse {
  return {
    status,
    headers: new Headers(headers),
    body: new TextEncoder().encode(body),
  };
}

describe('createHttpClient', () => {
  it('should convert the timeout to milliseconds', async () => {
    const client = createHttpClient({ ignoreCert: false, timeout: 2 });

    expect(client.timeout).toBe(2000);
    await client.close();
  });

  it('should disable the timeout for 0', async () => {
    const client = createHttpClient({ ignoreCert: true, timeout: 0 });

    expect(client.timeout).toBe(false);
    await client.close();
  });

  it('should reject a negative timeout', () => {
    expect(() => createHttpClient({ ignoreCert: false, timeout: -5 })).toThrow(
      'Invalid timeout -5: expected seconds, or 0 for none',
    );
  });
});

describe('buildUrl', () => {
  it('should join the endpoint and a path', () => {
    expect(buildUrl('https://cluster.example.com:8080', 'platform/latest')).toBe(
      'https://cluster.example.com:8080/platform/latest',
    );
  });

  it('should join path segments with slashes', () => {
    expect(
      buildUrl('https://cluster.example.com:8080', [
        'platform/16',
        'auth',
        'users',
        'alice',
      ]),
    ).toBe('https://cluster.example.com:8080/platform/16/auth/users/alice');
  });

  it('should keep a path already on the endpoint', () => {
    expect(buildUrl('https://cluster.example.com:8080/api/', '/zones')).toBe(
      'https://cluster.example.com:8080/api/zones',
    );
  });

  it('should encode query keys in sorted order', () => {
    expect(
      buildUrl('https://cluster.example.com:8080', 'platform/16/auth/users', {
        zone: 'System',
        force: 'True',
      }),
    ).toBe(
      'https://cluster.example.com:8080/platform/16/auth/users?force=True&zone=System',
    );
  });

  it('should form-encode query values', () => {
    expect(
      buildUrl('https://cluster.example.com:8080', 'zones', {
        resume: 'a b+c/=',
      }),
    ).toBe('https://cluster.example.com:8080/zones?resume=a+b%2Bc%2F%3D');
  });

  it('should encode spaces in path segments', () => {
    expect(
      buildUrl('https://cluster.example.com:8080', ['auth', 'users', 'jane doe']),
    ).toBe('https://cluster.example.com:8080/auth/users/jane%20doe');
  });

  it('should omit an empty query', () => {
    expect(buildUrl('https://cluster.example.com:8080', 'zones', {})).toBe(
      'https://cluster.example.com:8080/zones',
    );
  });

  it('should reject an endpoint without protocol', () => {
    expect(() => buildUrl('cluster.example.com', 'zones')).toThrow(ConfigError);
  });

  it('should reject an empty endpoint', () => {
    expect(() => buildUrl('', 'zones')).toThrow(
      'Invalid endpoint "": expected protocol, host and port',
    );
  });
});

describe('assembleHeaders', () => {
  it('should add every default header', () => {
    expect(assembleHeaders(undefined, context)).toEqual({
      Accept: 'application/json',
      Cookie: 'isisessid=session-1',
      'Content-Type': 'application/json',
      Referer: 'https://cluster.example.com:8080',
      'X-CSRF-Token': 'csrf-1',
    });
  });

  it('should keep a caller Accept header and still inject the session', () => {
    expect(assembleHeaders({ Accept: 'text/plain' }, context)).toEqual({
      Accept: 'text/plain',
      Cookie: 'isisessid=session-1',
      'Content-Type': 'application/json',
      Referer: 'https://cluster.example.com:8080',
      'X-CSRF-Token': 'csrf-1',
    });
  });

  it('should let caller headers replace session headers', () => {
    const headers = assembleHeaders(
      { Cookie: 'isisessid=other', 'X-CSRF-Token': 'other-csrf' },
      context,
    );

    expect(headers.Cookie).toBe('isisessid=other');
    expect(headers['X-CSRF-Token']).toBe('other-csrf');
  });

  it('should compare header names case-sensitively', () => {
    const headers = assembleHeaders({ accept: 'text/plain' }, context);

    expect(headers.accept).toBe('text/plain');
    expect(headers.Accept).toBe('application/json');
  });

  it('should keep extra caller headers', () => {
    const headers = assembleHeaders({ 'x-isi-ifs-target-type': 'object' }, context);

    expect(headers['x-isi-ifs-target-type']).toBe('object');
  });
});

describe('isSuccessStatus', () => {
  it('should accept only 2xx', () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(299)).toBe(true);
    expect(isSuccessStatus(199)).toBe(false);
    expect(isSuccessStatus(300)).toBe(false);
    expect(isSuccessStatus(401)).toBe(false);
  });
});

describe('parseErrorEntries', () => {
  it('should read the errors array', () => {
    expect(
      parseErrorEntries('{"errors":[{"code":"AEC_CONFLICT","message":"exists"}]}'),
    ).toEqual([{ code: 'AEC_CONFLICT', message: 'exists' }]);
  });

  it('should return no entries for plain text', () => {
    expect(parseErrorEntries('Service Unavailable')).toEqual([]);
  });

  it('should return no entries without an errors array', () => {
    expect(parseErrorEntries('{"message":"nope"}')).toEqual([]);
  });
});

describe('toApiError', () => {
  it('should map 400 to BadRequestError', () => {
    const error = toApiError(rawResponse(400, 'bad input'));

    expect(error).toBeInstanceOf(BadRequestError);
    expect(error.message).toBe('Non 2xx response received (400): bad input');
    expect(error.body).toBe('bad input');
    expect(error.errors).toEqual([]);
  });

  it('should map 401 to AuthenticationError', () => {
    const error = toApiError(
      rawResponse(
        401,
        '{"errors":[{"code":"AEC_UNAUTHORIZED","message":"Authorization required"}]}',
      ),
    );

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.statusCode).toBe(401);
    expect(error.message).toBe(
      'Non 2xx response received (401): Authorization required',
    );
  });

  it('should map 404 to NotFoundError using the error message', () => {
    const error = toApiError(
      rawResponse(
        404,
        '{"errors":[{"code":"AEC_NOT_FOUND","message":"Zone not found"}]}',
      ),
    );

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Resource not found: Zone not found');
    expect(error.hasCode('AEC_NOT_FOUND')).toBe(true);
  });

  it('should map 409 to ConflictError', () => {
    const error = toApiError(
      rawResponse(
        409,
        '{"errors":[{"code":"AEC_CONFLICT","message":"Already a member"}]}',
      ),
    );

    expect(error).toBeInstanceOf(ConflictError);
    expect(error.hasCode('AEC_CONFLICT')).toBe(true);
  });

  it('should map 429 to RateLimitError with Retry-After', () => {
    const error = toApiError(rawResponse(429, '', { 'Retry-After': '30' }));

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.message).toBe('Non 2xx response received (429): HTTP 429 error');
    if (error instanceof RateLimitError) {
      expect(error.retryAfter).toBe(30);
    }
  });

  it('should map 5xx to ServerError', () => {
    const error = toApiError(rawResponse(503, 'Service Unavailable'));

    expect(error).toBeInstanceOf(ServerError);
    expect(error.statusCode).toBe(503);
    expect(error.retryable).toBe(true);
  });

  it('should map other statuses to ApiError', () => {
    const error = toApiError(rawResponse(418, 'teapot'));

    expect(error.constructor).toBe(ApiError);
    expect(error.statusCode).toBe(418);
  });
});
