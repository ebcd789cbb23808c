import { HttpResponse, http } from 'msw';
import type { SessionConfig } from '../../src/config.js';

export const BASE_URL = 'http://localhost:8080';

export const SESSION_TOKEN = 'test-session-token';
export const CSRF_TOKEN = 'test-csrf-token';

/**
 * Credentials accepted by the mock cluster
 */
export const TEST_CONFIG: SessionConfig = {
  endpoint: BASE_URL,
  user: 'admin',
  password: 'test-password',
};

export const PLATFORM_URL = `${BASE_URL}/platform/16`;

export interface LoginBody {
  username: string;
  password: string;
  services: string[];
}

// Mock data
export const mockZones = [
  {
    id: 'System',
    name: 'System',
    zone_id: 1,
    path: '/ifs',
    groupnet: 'groupnet0',
    system: true,
    auth_providers: ['lsa-local-provider:System', 'lsa-file-provider:System'],
  },
  {
    id: 'tenant-a',
    name: 'tenant-a',
    zone_id: 2,
    path: '/ifs/tenant-a',
    groupnet: 'groupnet0',
    system: false,
    auth_providers: ['lsa-local-provider:tenant-a'],
  },
];

export const mockUsers = [
  {
    name: 'alice',
    email: 'alice@example.com',
    enabled: true,
    home_directory: '/ifs/home/alice',
    primary_group: { id: 'GROUP:users', name: 'users', type: 'group' },
    member_of: [{ id: 'GROUP:users', name: 'users', type: 'group' }],
  },
  {
    name: 'bob',
    enabled: false,
    home_directory: '/ifs/home/bob',
    primary_group: { id: 'GROUP:users', name: 'users', type: 'group' },
  },
];

export const mockS3Key = {
  access_id: '1_alice_accid',
  secret_key: 'test-secret',
  secret_key_timestamp: 1700000000,
  old_key_expiry: 0,
  old_key_timestamp: 0,
};

/**
 * Login response carrying both session cookies in separate headers
 */
export function sessionCookieHeaders(
  sessionToken = SESSION_TOKEN,
  csrfToken = CSRF_TOKEN,
): Headers {
  const headers = new Headers();
  headers.append(
    'Set-Cookie',
    `isisessid=${sessionToken}; path=/; HttpOnly; Secure`,
  );
  headers.append('Set-Cookie', `isicsrf=${csrfToken}; path=/; Secure`);
  return headers;
}

export function unauthorizedResponse() {
  return HttpResponse.json(
    {
      errors: [{ code: 'AEC_UNAUTHORIZED', message: 'Authorization required' }],
    },
    { status: 401 },
  );
}

export function loginResponse(body: LoginBody) {
  if (
    body.username === TEST_CONFIG.user &&
    body.password === TEST_CONFIG.password
  ) {
    return HttpResponse.json(
      {
        services: body.services,
        timeout_absolute: 14400,
        timeout_inactive: 900,
        username: body.username,
      },
      { status: 201, headers: sessionCookieHeaders() },
    );
  }

  return unauthorizedResponse();
}

/**
 * Whether a request carries the mock cluster's session cookie and CSRF token
 * msw merges cookies from earlier mocked responses into the Cookie header
 */
export function isAuthenticated(
  request: Request,
  cookies: Record<string, string>,
): boolean {
  return (
    cookies.isisessid === SESSION_TOKEN &&
    request.headers.get('X-CSRF-Token') === CSRF_TOKEN
  );
}

export const handlers = [
  // Session
  http.post<never, LoginBody>(
    `${BASE_URL}/session/1/session`,
    async ({ request }) => loginResponse(await request.json()),
  ),

  http.delete(`${BASE_URL}/session/1/session`, () => {
    return new HttpResponse(null, { status: 204 });
  }),

  // Platform
  http.get(`${BASE_URL}/platform/latest`, () => {
    return HttpResponse.json({ latest: '16' });
  }),

  // Zones
  http.get(`${PLATFORM_URL}/zones`, ({ request, cookies }) => {
    if (!isAuthenticated(request, cookies)) {
      return unauthorizedResponse();
    }
    return HttpResponse.json({ zones: mockZones, total: mockZones.length });
  }),

  // Users
  http.get(`${PLATFORM_URL}/auth/users`, ({ request, cookies }) => {
    if (!isAuthenticated(request, cookies)) {
      return unauthorizedResponse();
    }
    return HttpResponse.json({ users: mockUsers, total: mockUsers.length });
  }),

  http.get(`${PLATFORM_URL}/auth/users/:name`, ({ params }) => {
    const user = mockUsers.find((candidate) => candidate.name === params.name);

    if (!user) {
      return HttpResponse.json(
        {
          errors: [
            {
              code: 'AEC_NOT_FOUND',
              message: `Failed to find user for 'USER:${String(params.name)}'`,
            },
          ],
        },
        { status: 404 },
      );
    }

    return HttpResponse.json({ users: [user] });
  }),

  http.post(`${PLATFORM_URL}/auth/users`, () => {
    return HttpResponse.json({ id: 'UID:2001' }, { status: 201 });
  }),

  http.delete(`${PLATFORM_URL}/auth/users/:name`, () => {
    return new HttpResponse(null, { status: 204 });
  }),

  // Groups
  http.post(`${PLATFORM_URL}/auth/groups/:group/members`, () => {
    return HttpResponse.json({ id: 'UID:2001' }, { status: 201 });
  }),

  // S3
  http.post(`${PLATFORM_URL}/protocols/s3/keys/:name`, () => {
    return HttpResponse.json({ keys: mockS3Key });
  }),
];
