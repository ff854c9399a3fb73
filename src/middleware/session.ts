import type { Context as HonoContext } from 'hono';
import { createMiddleware } from 'hono/factory';
import type { ActiveSession, AppContext, Context } from '../context';
import { AuthError, invalidSession } from '../errors';
import { InvalidSessionError, UserNotFoundError } from '../services/errors';

export function readBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (scheme?.toLowerCase() !== 'bearer' || !token || rest.length > 0) {
    return null;
  }
  return token;
}

/** Resolves the bearer token, if any, into `session`. Never rejects a request. */
export function loadSession({ credentials, sessions }: AppContext) {
  return createMiddleware<Context>(async (c, next) => {
    const token = readBearerToken(c.req.header('Authorization'));
    c.set('token', token);
    c.set('session', null);

    if (token !== null) {
      try {
        const userId = await sessions.validate(token);
        const user = await credentials.findUserById(userId);
        c.set('session', { token, userId, identifier: user.identifier });
      } catch (err) {
        if (
          !(err instanceof InvalidSessionError) &&
          !(err instanceof UserNotFoundError)
        ) {
          throw err;
        }
      }
    }

    await next();
  });
}

export function requireSession(c: HonoContext<Context>): ActiveSession {
  const session = c.get('session');
  if (session === null) {
    throw c.get('token') === null
      ? new AuthError('missing_token', 'No token provided')
      : invalidSession();
  }
  return session;
}

export const loggedIn = createMiddleware<Context>(async (c, next) => {
  requireSession(c);
  await next();
});
