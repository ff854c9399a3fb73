import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import type { AppContext, Context } from '../context';
import { rejectInvalid } from '../errors';
import { loggedIn, requireSession } from '../middleware/session';
import { InvalidSessionError } from '../services/errors';
import {
  credentialsSchema,
  updatePasswordSchema,
  type IssuedToken,
  type RegisteredUser,
  type SessionIdentity,
  type SuccessResponse,
} from '../types';

export function createAuthRouter({ credentials, sessions }: AppContext) {
  return new Hono<Context>()
    .post(
      '/register',
      zValidator('json', credentialsSchema, rejectInvalid),
      async (c) => {
        const { identifier, password } = c.req.valid('json');
        const userId = await credentials.createUser(identifier, password);

        return c.json<SuccessResponse<RegisteredUser>>(
          {
            success: true,
            message: 'User created',
            data: { userId, user_id: userId },
          },
          201,
        );
      },
    )
    .post(
      '/login',
      zValidator('json', credentialsSchema, rejectInvalid),
      async (c) => {
        const { identifier, password } = c.req.valid('json');
        const user = await credentials.verifyCredentials(identifier, password);
        const issued = await sessions.issue(user.id);

        return c.json<SuccessResponse<IssuedToken>>(
          {
            success: true,
            message: 'Logged in',
            data: {
              token: issued.token,
              expiresAt: issued.expiresAt.toISOString(),
            },
          },
          200,
        );
      },
    )
    .get('/validate', loggedIn, (c) => {
      const { userId, identifier } = requireSession(c);

      return c.json<SuccessResponse<SessionIdentity>>({
        success: true,
        message: 'Session is valid',
        data: { userId, user_id: userId, identifier },
      });
    })
    .post('/logout', async (c) => {
      const token = c.get('token');

      if (token !== null) {
        try {
          await sessions.revoke(token);
        } catch (err) {
          // Logging out with an unknown token is still a successful logout.
          if (!(err instanceof InvalidSessionError)) {
            throw err;
          }
        }
      }

      return c.json<SuccessResponse<{ ok: true }>>({
        success: true,
        message: 'Logged out',
        data: { ok: true },
      });
    })
    .post('/refresh', loggedIn, async (c) => {
      const session = requireSession(c);
      const issued = await sessions.refresh(session.token);

      return c.json<SuccessResponse<IssuedToken>>({
        success: true,
        message: 'Session refreshed',
        data: {
          token: issued.token,
          expiresAt: issued.expiresAt.toISOString(),
        },
      });
    })
    .put(
      '/password',
      loggedIn,
      zValidator('json', updatePasswordSchema, rejectInvalid),
      async (c) => {
        const session = requireSession(c);
        const { currentPassword, newPassword } = c.req.valid('json');

        await credentials.changePassword(
          session.userId,
          currentPassword,
          newPassword,
        );
        await sessions.revokeAllForUser(session.userId, {
          except: session.token,
        });

        return c.json<SuccessResponse>({
          success: true,
          message: 'Password updated',
        });
      },
    );
}
