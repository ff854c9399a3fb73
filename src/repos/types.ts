export type UserRecord = {
  id: string;
  identifier: string;
  passwordHash: string;
  createdAt: Date;
};

export type SessionRecord = {
  /** Hex SHA-256 of the session token. */
  tokenHash: string;
  userId: string;
  createdAt: Date;
  expiresAt: Date;
  revoked: boolean;
};

export interface UserRepo {
  /** Throws `DuplicateIdentifierError` when the identifier is taken. */
  insertUser(user: UserRecord): Promise<void>;
  getUserByIdentifier(identifier: string): Promise<UserRecord | null>;
  getUserById(userId: string): Promise<UserRecord | null>;
  updatePasswordHash(userId: string, passwordHash: string): Promise<void>;
}

export interface SessionRepo {
  insertSession(session: SessionRecord): Promise<void>;
  getSession(tokenHash: string): Promise<SessionRecord | null>;
  /** Resolves `true` only when this call moved the session from active to revoked. */
  revokeSession(tokenHash: string): Promise<boolean>;
  /** Revokes every active session of the user except `exceptTokenHash`. */
  revokeUserSessions(userId: string, exceptTokenHash?: string): Promise<void>;
}
