import { z } from 'zod';

export type SuccessResponse<T = void> = {
  success: true;
  message: string;
} & (T extends void ? object : { data: T });

export type ErrorCode =
  | 'validation_error'
  | 'missing_token'
  | 'invalid_session'
  | 'invalid_credentials'
  | 'not_found'
  | 'duplicate_identifier'
  | 'internal_error';

export type ErrorResponse = {
  success: false;
  error: string;
  code: ErrorCode;
  isFormError?: boolean;
};

const identifierSchema = z.string().trim().toLowerCase().min(3).max(255);
const passwordSchema = z.string().min(6).max(255);

export const credentialsSchema = z.object({
  identifier: identifierSchema,
  password: passwordSchema,
});

export const updatePasswordSchema = z.object({
  currentPassword: passwordSchema,
  newPassword: passwordSchema,
});

export type IssuedToken = {
  token: string;
  expiresAt: string;
};

// `user_id` mirrors `userId` under the wire name clients already read.
export type RegisteredUser = {
  userId: string;
  user_id: string;
};

export type SessionIdentity = RegisteredUser & {
  identifier: string;
};

export type UserProfile = {
  id: string;
  identifier: string;
  createdAt: string;
};
