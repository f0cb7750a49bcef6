/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: wrong email or password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Incorrect email or password', meta);
  },

  alreadyRegistered(meta?: AppErrorMeta) {
    return AppError.conflict('Email already registered', meta);
  },

  inactiveUser(meta?: AppErrorMeta) {
    return AppError.forbidden('Inactive user', meta);
  },

  /** Valid token, but the user row is gone or deactivated. */
  userUnavailable(meta?: AppErrorMeta) {
    return AppError.unauthorized('User not found or inactive', meta);
  },
} as const;
