import { createHash, randomBytes } from 'node:crypto';
import type { SessionRepo } from '../repos/types';
import { InvalidSessionError } from './errors';

const TOKEN_BYTES = 32;

export type IssuedSession = {
  token: string;
  userId: string;
  expiresAt: Date;
};

export function hashToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Issues, validates and revokes opaque session tokens.
 *
 * A session lives for a fixed `ttlMs` from issuance; it is never extended.
 * Expiry is checked lazily on `validate`, nothing sweeps the store.
 * Only the SHA-256 of a token reaches the repository.
 */
export class SessionManager {
  constructor(
    private readonly repo: SessionRepo,
    private readonly ttlMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async issue(userId: string): Promise<IssuedSession> {
    const token = randomBytes(TOKEN_BYTES).toString('base64url');
    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + this.ttlMs);

    await this.repo.insertSession({
      tokenHash: hashToken(token),
      userId,
      createdAt,
      expiresAt,
      revoked: false,
    });

    return { token, userId, expiresAt };
  }

  /** Resolves to the owning user's id. */
  async validate(token: string): Promise<string> {
    const session = await this.repo.getSession(hashToken(token));
    if (session === null) {
      throw new InvalidSessionError('unknown');
    }
    if (session.revoked) {
      throw new InvalidSessionError('revoked');
    }
    if (session.expiresAt.getTime() <= this.now().getTime()) {
      throw new InvalidSessionError('expired');
    }
    return session.userId;
  }

  /**
   * Marks the session revoked. Revoking a session that is already revoked or
   * expired succeeds; only an unknown token is rejected.
   */
  async revoke(token: string): Promise<void> {
    const tokenHash = hashToken(token);
    const session = await this.repo.getSession(tokenHash);
    if (session === null) {
      throw new InvalidSessionError('unknown');
    }
    await this.repo.revokeSession(tokenHash);
  }

  async revokeAllForUser(
    userId: string,
    options: { except?: string } = {},
  ): Promise<void> {
    await this.repo.revokeUserSessions(
      userId,
      options.except === undefined ? undefined : hashToken(options.except),
    );
  }

  /**
   * Swaps a valid token for a new one. The presented token is revoked before
   * the successor is issued, so concurrent refreshes yield one successor.
   */
  async refresh(token: string): Promise<IssuedSession> {
    const userId = await this.validate(token);
    if (!(await this.repo.revokeSession(hashToken(token)))) {
      throw new InvalidSessionError('revoked');
    }
    return this.issue(userId);
  }
}
