import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { createAppContext } from './context';

const config = loadConfig();
const ctx = createAppContext(config);
const app = createApp(ctx);

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Auth service listening on http://localhost:${info.port}`);
});

function shutdown(signal: NodeJS.Signals) {
  console.log(`Received ${signal}, shutting down`);
  server.close(() => {
    ctx.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(err);
        process.exit(1);
      },
    );
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
