import { createApp } from './app';
import type { Config } from './config';
import { createAppContext } from './context';

export const TEST_TTL_MS = 60 * 60 * 1000;

export const testConfig: Config = {
  port: 0,
  store: { driver: 'memory' },
  sessionTtlMs: TEST_TTL_MS,
  production: false,
};

/** A settable clock starting at a fixed instant. */
export function createClock(start = '2026-01-01T00:00:00.000Z') {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
  };
}

export function createTestApp(
  options: { now?: () => Date; config?: Partial<Config> } = {},
) {
  const ctx = createAppContext(
    { ...testConfig, ...options.config },
    { now: options.now },
  );
  const app = createApp(ctx, { log: () => {} });
  return { app, ctx };
}

export function jsonRequest(
  method: string,
  body: unknown,
  token?: string,
): RequestInit {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (token !== undefined) {
    headers.Authorization = `Bearer ${token}`;
  }
  return { method, headers, body: JSON.stringify(body) };
}

export function withToken(method: string, token: string): RequestInit {
  return { method, headers: { Authorization: `Bearer ${token}` } };
}

type TestApp = ReturnType<typeof createTestApp>['app'];

export async function register(
  app: TestApp,
  identifier: string,
  password: string,
): Promise<string> {
  const res = await app.request(
    '/api/auth/register',
    jsonRequest('POST', { identifier, password }),
  );
  if (res.status !== 201) {
    throw new Error(`register failed with ${res.status}`);
  }
  const body = (await res.json()) as { data: { userId: string } };
  return body.data.userId;
}

export async function login(
  app: TestApp,
  identifier: string,
  password: string,
): Promise<string> {
  const res = await app.request(
    '/api/auth/login',
    jsonRequest('POST', { identifier, password }),
  );
  if (res.status !== 200) {
    throw new Error(`login failed with ${res.status}`);
  }
  const body = (await res.json()) as { data: { token: string } };
  return body.data.token;
}
