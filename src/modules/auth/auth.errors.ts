/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether a username exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown username or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid username or password.', meta);
  },

  /** Login: no usable Basic credentials in the Authorization header. */
  missingCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Basic credentials are required.', meta);
  },

  /** Change password: the old password did not match (or a concurrent change won). */
  passwordChangeRejected(meta?: AppErrorMeta) {
    return AppError.validationError('The current password is incorrect.', meta);
  },
} as const;
