import { z } from 'zod';

export const MAX_SESSION_TTL_HOURS = 24 * 365;

const envSchema = z.object({
  PORT: z.number({ coerce: true }).int().positive().default(3000),
  DATABASE_URL: z.string().url().optional(),
  STORE_DRIVER: z.enum(['mysql', 'memory']).default('mysql'),
  // expires_at is a MySQL TIMESTAMP, which ends in 2038.
  SESSION_TTL_HOURS: z
    .number({ coerce: true })
    .positive()
    .max(MAX_SESSION_TTL_HOURS)
    .default(24 * 30),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type StoreConfig =
  | { driver: 'memory' }
  | { driver: 'mysql'; databaseUrl: string };

export type Config = {
  port: number;
  store: StoreConfig;
  sessionTtlMs: number;
  production: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);

  let store: StoreConfig;
  if (parsed.STORE_DRIVER === 'mysql') {
    if (parsed.DATABASE_URL === undefined) {
      throw new Error('DATABASE_URL is required when STORE_DRIVER=mysql');
    }
    store = { driver: 'mysql', databaseUrl: parsed.DATABASE_URL };
  } else {
    store = { driver: 'memory' };
  }

  return {
    port: parsed.PORT,
    store,
    sessionTtlMs: parsed.SESSION_TTL_HOURS * 60 * 60 * 1000,
    production: parsed.NODE_ENV === 'production',
  };
}
