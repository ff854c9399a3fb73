import { describe, expect, it } from 'vitest';
import { DuplicateIdentifierError } from '../services/errors';
import { InMemorySessionRepo, InMemoryUserRepo } from './memory';

const createdAt = new Date('2026-01-01T00:00:00.000Z');

describe('InMemoryUserRepo', () => {
  it('enforces unique identifiers', async () => {
    const repo = new InMemoryUserRepo();
    await repo.insertUser({ id: 'u1', identifier: 'alice', passwordHash: 'h1', createdAt });

    await expect(
      repo.insertUser({ id: 'u2', identifier: 'alice', passwordHash: 'h2', createdAt }),
    ).rejects.toBeInstanceOf(DuplicateIdentifierError);
    expect(await repo.getUserById('u2')).toBeNull();
  });

  it('hands out copies', async () => {
    const repo = new InMemoryUserRepo();
    await repo.insertUser({ id: 'u1', identifier: 'alice', passwordHash: 'h1', createdAt });

    const user = await repo.getUserByIdentifier('alice');
    if (user === null) {
      throw new Error('expected a user');
    }
    user.passwordHash = 'tampered';

    await repo.updatePasswordHash('u1', 'h2');
    expect(await repo.getUserById('u1')).toEqual({
      id: 'u1',
      identifier: 'alice',
      passwordHash: 'h2',
      createdAt,
    });
  });
});

describe('InMemorySessionRepo', () => {
  it('revokes sessions by token and by user', async () => {
    const repo = new InMemorySessionRepo();
    const expiresAt = new Date('2026-01-02T00:00:00.000Z');
    for (const [tokenHash, userId] of [
      ['t1', 'u1'],
      ['t2', 'u1'],
      ['t3', 'u1'],
      ['t4', 'u2'],
    ]) {
      await repo.insertSession({ tokenHash, userId, createdAt, expiresAt, revoked: false });
    }

    expect(await repo.revokeSession('t1')).toBe(true);
    await repo.revokeUserSessions('u1', 't2');

    const revoked = await Promise.all(
      ['t1', 't2', 't3', 't4'].map(
        async (tokenHash) => (await repo.getSession(tokenHash))?.revoked,
      ),
    );
    expect(revoked).toEqual([true, false, true, false]);
  });

  it('reports whether a revoke changed anything', async () => {
    const repo = new InMemorySessionRepo();
    await repo.insertSession({
      tokenHash: 't1',
      userId: 'u1',
      createdAt,
      expiresAt: new Date('2026-01-02T00:00:00.000Z'),
      revoked: false,
    });

    expect(await repo.revokeSession('t1')).toBe(true);
    expect(await repo.revokeSession('t1')).toBe(false);
    expect(await repo.revokeSession('missing')).toBe(false);
  });
});
