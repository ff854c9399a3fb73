import type { Config } from './config';
import { createDb } from './db';
import { DrizzleSessionRepo, DrizzleUserRepo } from './repos/drizzle';
import { InMemorySessionRepo, InMemoryUserRepo } from './repos/memory';
import type { SessionRepo, UserRepo } from './repos/types';
import { CredentialStore } from './services/credential-store';
import { SessionManager } from './services/session-manager';

export type ActiveSession = {
  token: string;
  userId: string;
  identifier: string;
};

export type Context = {
  Variables: {
    token: string | null;
    session: ActiveSession | null;
  };
};

export type AppContext = {
  config: Config;
  credentials: CredentialStore;
  sessions: SessionManager;
  close: () => Promise<void>;
};

type Repos = {
  users: UserRepo;
  sessions: SessionRepo;
  close: () => Promise<void>;
};

function createRepos(config: Config): Repos {
  if (config.store.driver === 'memory') {
    return {
      users: new InMemoryUserRepo(),
      sessions: new InMemorySessionRepo(),
      close: async () => {},
    };
  }

  const { db, close } = createDb(config.store.databaseUrl);
  return {
    users: new DrizzleUserRepo(db),
    sessions: new DrizzleSessionRepo(db),
    close,
  };
}

/**
 * Builds the services the handlers run against. Everything stateful hangs
 * off the returned object; nothing is cached at module level.
 */
export function createAppContext(
  config: Config,
  options: { now?: () => Date } = {},
): AppContext {
  const now = options.now ?? (() => new Date());
  const repos = createRepos(config);

  return {
    config,
    credentials: new CredentialStore(repos.users, now),
    sessions: new SessionManager(repos.sessions, config.sessionTtlMs, now),
    close: repos.close,
  };
}
