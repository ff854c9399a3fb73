import { DuplicateIdentifierError } from '../services/errors';
import type {
  SessionRecord,
  SessionRepo,
  UserRecord,
  UserRepo,
} from './types';

export class InMemoryUserRepo implements UserRepo {
  private readonly usersById = new Map<string, UserRecord>();
  private readonly userIdsByIdentifier = new Map<string, string>();

  async insertUser(user: UserRecord): Promise<void> {
    if (this.userIdsByIdentifier.has(user.identifier)) {
      throw new DuplicateIdentifierError(user.identifier);
    }
    this.usersById.set(user.id, { ...user });
    this.userIdsByIdentifier.set(user.identifier, user.id);
  }

  async getUserByIdentifier(identifier: string): Promise<UserRecord | null> {
    const userId = this.userIdsByIdentifier.get(identifier);
    if (userId === undefined) {
      return null;
    }
    return this.getUserById(userId);
  }

  async getUserById(userId: string): Promise<UserRecord | null> {
    const user = this.usersById.get(userId);
    return user === undefined ? null : { ...user };
  }

  async updatePasswordHash(userId: string, passwordHash: string): Promise<void> {
    const user = this.usersById.get(userId);
    if (user !== undefined) {
      user.passwordHash = passwordHash;
    }
  }
}

export class InMemorySessionRepo implements SessionRepo {
  private readonly sessionsByHash = new Map<string, SessionRecord>();

  async insertSession(session: SessionRecord): Promise<void> {
    this.sessionsByHash.set(session.tokenHash, { ...session });
  }

  async getSession(tokenHash: string): Promise<SessionRecord | null> {
    const session = this.sessionsByHash.get(tokenHash);
    return session === undefined ? null : { ...session };
  }

  async revokeSession(tokenHash: string): Promise<boolean> {
    const session = this.sessionsByHash.get(tokenHash);
    if (session === undefined || session.revoked) {
      return false;
    }
    session.revoked = true;
    return true;
  }

  async revokeUserSessions(
    userId: string,
    exceptTokenHash?: string,
  ): Promise<void> {
    for (const session of this.sessionsByHash.values()) {
      if (session.userId === userId && session.tokenHash !== exceptTokenHash) {
        session.revoked = true;
      }
    }
  }
}
