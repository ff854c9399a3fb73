import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { logger } from 'hono/logger';
import { prettyJSON } from 'hono/pretty-json';
import type { AppContext, Context } from './context';
import { codeForStatus, InternalError, toApiError } from './errors';
import { loadSession } from './middleware/session';
import { createAuthRouter } from './routes/auth';
import { createUsersRouter } from './routes/users';
import type { ErrorResponse } from './types';

export type AppOptions = {
  /** Where request logs go; defaults to `console.log`. */
  log?: (message: string, ...rest: string[]) => void;
};

function isFormError(cause: unknown): boolean {
  return cause && typeof cause === 'object' && 'form' in cause
    ? cause.form === true
    : false;
}

export function createApp(ctx: AppContext, options: AppOptions = {}) {
  const app = new Hono<Context>();

  app.use(logger(options.log));
  app.use(prettyJSON());
  app.use('/api/*', cors(), loadSession(ctx));

  app.get('/health', (c) => c.json({ status: 'ok' }, 200));

  app
    .basePath('/api')
    .route('/auth', createAuthRouter(ctx))
    .route('/users', createUsersRouter(ctx));

  app.notFound((c) =>
    c.json<ErrorResponse>(
      { success: false, error: 'Not Found', code: 'not_found' },
      404,
    ),
  );

  app.onError((err, c) => {
    const apiError = toApiError(err);
    if (apiError) {
      return c.json<ErrorResponse>(
        {
          success: false,
          error: apiError.message,
          code: apiError.code,
          isFormError: isFormError(apiError.cause),
        },
        apiError.status,
      );
    }

    if (err instanceof HTTPException) {
      return (
        err.res ??
        c.json<ErrorResponse>(
          {
            success: false,
            error: err.message,
            code: codeForStatus(err.status),
            isFormError: isFormError(err.cause),
          },
          err.status,
        )
      );
    }

    console.error(err);
    const internal = new InternalError(
      ctx.config.production ? 'Internal Server Error' : (err.stack ?? err.message),
      err,
    );
    return c.json<ErrorResponse>(
      { success: false, error: internal.message, code: internal.code },
      internal.status,
    );
  });

  return app;
}
