import { randomUUID } from 'node:crypto';
import { hashPassword, verifyPassword } from '../lib/password';
import type { UserRecord, UserRepo } from '../repos/types';
import {
  DuplicateIdentifierError,
  InvalidCredentialsError,
  UserNotFoundError,
} from './errors';

export class CredentialStore {
  // Verified against when the identifier is unknown, so a miss costs one scrypt run too.
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly repo: UserRepo,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async createUser(identifier: string, password: string): Promise<string> {
    const existing = await this.repo.getUserByIdentifier(identifier);
    if (existing !== null) {
      throw new DuplicateIdentifierError(identifier);
    }

    const user: UserRecord = {
      id: randomUUID(),
      identifier,
      passwordHash: await hashPassword(password),
      createdAt: this.now(),
    };
    await this.repo.insertUser(user);

    return user.id;
  }

  async findUser(identifier: string): Promise<UserRecord> {
    const user = await this.repo.getUserByIdentifier(identifier);
    if (user === null) {
      throw new UserNotFoundError(identifier);
    }
    return user;
  }

  async findUserById(userId: string): Promise<UserRecord> {
    const user = await this.repo.getUserById(userId);
    if (user === null) {
      throw new UserNotFoundError(userId);
    }
    return user;
  }

  async verifyCredentials(
    identifier: string,
    password: string,
  ): Promise<UserRecord> {
    const user = await this.repo.getUserByIdentifier(identifier);
    if (user === null) {
      await verifyPassword(password, await this.getDummyHash());
      throw new InvalidCredentialsError();
    }

    if (!(await verifyPassword(password, user.passwordHash))) {
      throw new InvalidCredentialsError();
    }
    return user;
  }

  async changePassword(
    userId: string,
    currentPassword: string,
    newPassword: string,
  ): Promise<void> {
    const user = await this.findUserById(userId);
    if (!(await verifyPassword(currentPassword, user.passwordHash))) {
      throw new InvalidCredentialsError();
    }

    await this.repo.updatePasswordHash(userId, await hashPassword(newPassword));
  }

  private getDummyHash(): Promise<string> {
    if (this.dummyHash === null) {
      this.dummyHash = hashPassword(randomUUID());
    }
    return this.dummyHash;
  }
}
