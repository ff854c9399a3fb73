import { Hono } from 'hono';
import type { AppContext, Context } from '../context';
import { loggedIn, requireSession } from '../middleware/session';
import type { SuccessResponse, UserProfile } from '../types';

export function createUsersRouter({ credentials }: AppContext) {
  return new Hono<Context>().get('/profile', loggedIn, async (c) => {
    const { userId } = requireSession(c);
    const user = await credentials.findUserById(userId);

    return c.json<SuccessResponse<UserProfile>>({
      success: true,
      message: 'User fetched',
      data: {
        id: user.id,
        identifier: user.identifier,
        createdAt: user.createdAt.toISOString(),
      },
    });
  });
}
