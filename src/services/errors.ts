export class DuplicateIdentifierError extends Error {
  constructor(readonly identifier: string) {
    super(`Identifier "${identifier}" is already registered`);
    this.name = 'DuplicateIdentifierError';
  }
}

export class UserNotFoundError extends Error {
  constructor(lookup: string) {
    super(`User not found: ${lookup}`);
    this.name = 'UserNotFoundError';
  }
}

// Unknown identifier and wrong password both end up here.
export class InvalidCredentialsError extends Error {
  constructor() {
    super('Invalid identifier or password');
    this.name = 'InvalidCredentialsError';
  }
}

export class InvalidSessionError extends Error {
  constructor(readonly reason: 'unknown' | 'revoked' | 'expired') {
    super(`Session is ${reason === 'unknown' ? 'not recognised' : reason}`);
    this.name = 'InvalidSessionError';
  }
}
