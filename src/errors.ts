import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import {
  DuplicateIdentifierError,
  InvalidCredentialsError,
  InvalidSessionError,
  UserNotFoundError,
} from './services/errors';
import type { ErrorCode } from './types';

type ErrorStatus = 400 | 401 | 404 | 409 | 500;

export class ApiError extends HTTPException {
  constructor(
    status: ErrorStatus,
    readonly code: ErrorCode,
    message: string,
    options: { form?: boolean; cause?: unknown } = {},
  ) {
    super(status, {
      message,
      cause: { form: options.form === true, error: options.cause },
    });
  }
}

export class ValidationError extends ApiError {
  constructor(message: string) {
    super(400, 'validation_error', message, { form: true });
  }
}

export class AuthError extends ApiError {
  constructor(
    code: Extract<ErrorCode, 'missing_token' | 'invalid_session' | 'invalid_credentials'>,
    message: string,
  ) {
    super(401, code, message, { form: code === 'invalid_credentials' });
  }
}

export class ConflictError extends ApiError {
  constructor(message: string) {
    super(409, 'duplicate_identifier', message, { form: true });
  }
}

export class InternalError extends ApiError {
  constructor(message: string, cause?: unknown) {
    super(500, 'internal_error', message, { cause });
  }
}

export const invalidSession = () =>
  new AuthError('invalid_session', 'Invalid or expired token');

/** Maps service-level failures onto their HTTP error. */
export function toApiError(err: unknown): ApiError | null {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof DuplicateIdentifierError) {
    return new ConflictError('Identifier already exists');
  }
  if (err instanceof InvalidCredentialsError) {
    return new AuthError('invalid_credentials', 'Invalid identifier or password');
  }
  if (err instanceof InvalidSessionError || err instanceof UserNotFoundError) {
    return invalidSession();
  }
  return null;
}

export function codeForStatus(status: number): ErrorCode {
  switch (status) {
    case 400:
      return 'validation_error';
    case 401:
      return 'invalid_session';
    case 404:
      return 'not_found';
    case 409:
      return 'duplicate_identifier';
    default:
      return 'internal_error';
  }
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}

/** `@hono/zod-validator` hook turning a failed parse into a `ValidationError`. */
export function rejectInvalid(
  result: { success: true } | { success: false; error: ZodError },
): void {
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
}
