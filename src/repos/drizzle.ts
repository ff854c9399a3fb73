import { and, eq, ne } from 'drizzle-orm';
import type { Database } from '../db';
import { sessionTable, userTable } from '../db/schemas/auth';
import { DuplicateIdentifierError } from '../services/errors';
import type {
  SessionRecord,
  SessionRepo,
  UserRecord,
  UserRepo,
} from './types';

// drizzle wraps driver errors, so the mysql2 code may sit on a cause.
export function isDuplicateEntryError(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if ('code' in current && current.code === 'ER_DUP_ENTRY') {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export class DrizzleUserRepo implements UserRepo {
  constructor(private readonly db: Database) {}

  async insertUser(user: UserRecord): Promise<void> {
    try {
      await this.db.insert(userTable).values(user);
    } catch (err) {
      if (isDuplicateEntryError(err)) {
        throw new DuplicateIdentifierError(user.identifier);
      }
      throw err;
    }
  }

  async getUserByIdentifier(identifier: string): Promise<UserRecord | null> {
    const [user] = await this.db
      .select()
      .from(userTable)
      .where(eq(userTable.identifier, identifier))
      .limit(1);

    return user ?? null;
  }

  async getUserById(userId: string): Promise<UserRecord | null> {
    const [user] = await this.db
      .select()
      .from(userTable)
      .where(eq(userTable.id, userId))
      .limit(1);

    return user ?? null;
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    await this.db
      .update(userTable)
      .set({ passwordHash })
      .where(eq(userTable.id, userId));
  }
}

export function revokeSessionQuery(db: Database, tokenHash: string) {
  return db
    .update(sessionTable)
    .set({ revoked: true })
    .where(
      and(
        eq(sessionTable.tokenHash, tokenHash),
        eq(sessionTable.revoked, false),
      ),
    );
}

export function revokeUserSessionsQuery(
  db: Database,
  userId: string,
  exceptTokenHash?: string,
) {
  return db
    .update(sessionTable)
    .set({ revoked: true })
    .where(
      and(
        eq(sessionTable.userId, userId),
        eq(sessionTable.revoked, false),
        exceptTokenHash === undefined
          ? undefined
          : ne(sessionTable.tokenHash, exceptTokenHash),
      ),
    );
}

export class DrizzleSessionRepo implements SessionRepo {
  constructor(private readonly db: Database) {}

  async insertSession(session: SessionRecord): Promise<void> {
    await this.db.insert(sessionTable).values(session);
  }

  async getSession(tokenHash: string): Promise<SessionRecord | null> {
    const [session] = await this.db
      .select()
      .from(sessionTable)
      .where(eq(sessionTable.tokenHash, tokenHash))
      .limit(1);

    return session ?? null;
  }

  async revokeSession(tokenHash: string): Promise<boolean> {
    const [result] = await revokeSessionQuery(this.db, tokenHash);
    return result.affectedRows > 0;
  }

  async revokeUserSessions(
    userId: string,
    exceptTokenHash?: string,
  ): Promise<void> {
    await revokeUserSessionsQuery(this.db, userId, exceptTokenHash);
  }
}
