/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether a username exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  /** verify/login: unknown username or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid username or password.', meta);
  },

  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This username is already taken.', meta);
  },

  invalidUsername(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(reason, meta);
  },

  weakPassword(reason: string, meta?: AppErrorMeta) {
    return AppError.validationError(reason, meta);
  },

  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },
} as const;
