import { afterEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import type { AppContext } from './context';
import { InMemorySessionRepo } from './repos/memory';
import type { UserRepo } from './repos/types';
import { CredentialStore } from './services/credential-store';
import { SessionManager } from './services/session-manager';
import { createTestApp, jsonRequest, testConfig } from './test-helpers';

const unavailableRepo: UserRepo = {
  insertUser: async () => {
    throw new Error('connect ECONNREFUSED');
  },
  getUserByIdentifier: async () => {
    throw new Error('connect ECONNREFUSED');
  },
  getUserById: async () => {
    throw new Error('connect ECONNREFUSED');
  },
  updatePasswordHash: async () => {
    throw new Error('connect ECONNREFUSED');
  },
};

function appWithUnavailableStore(production: boolean) {
  const ctx: AppContext = {
    config: { ...testConfig, production },
    credentials: new CredentialStore(unavailableRepo),
    sessions: new SessionManager(new InMemorySessionRepo(), 1000),
    close: async () => {},
  };
  return createApp(ctx, { log: () => {} });
}

describe('app', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports health without touching the store', async () => {
    const app = appWithUnavailableStore(true);

    const res = await app.request('/health');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('answers unknown routes with a JSON 404', async () => {
    const { app } = createTestApp();

    const res = await app.request('/api/nothing-here');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Not Found',
      code: 'not_found',
    });
  });

  it('hides internal failures in production', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const app = appWithUnavailableStore(true);

    const res = await app.request(
      '/api/auth/register',
      jsonRequest('POST', { identifier: 'alice', password: 'secret1' }),
    );

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Internal Server Error',
      code: 'internal_error',
    });
    expect(consoleError).toHaveBeenCalledOnce();
  });

  it('includes the failure detail outside production', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const app = appWithUnavailableStore(false);

    const res = await app.request(
      '/api/auth/login',
      jsonRequest('POST', { identifier: 'alice', password: 'secret1' }),
    );
    const body = (await res.json()) as { error: string; code: string };

    expect(res.status).toBe(500);
    expect(body.code).toBe('internal_error');
    expect(body.error).toContain('Error: connect ECONNREFUSED');
  });

  it('writes a request log line through the configured printer', async () => {
    const log = vi.fn();
    const { ctx } = createTestApp();
    const app = createApp(ctx, { log });

    await app.request('/health');

    expect(log).toHaveBeenCalledWith('<-- GET /health');
  });
});
