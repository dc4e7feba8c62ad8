/**
 * src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, hashes, salts or tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  /** Registration: the username already has a document in some role partition. */
  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('This username is already taken.', meta);
  },

  invalidUsername(meta?: AppErrorMeta) {
    return AppError.validationError(
      'Username must be 3-64 characters: letters, digits, "_", "." or "-".',
      meta,
    );
  },

  /** e.g. skills on an organizer, specializations on a volunteer. */
  fieldNotForRole(field: string, meta?: AppErrorMeta) {
    return AppError.validationError(`Field "${field}" does not apply to this role.`, meta);
  },
} as const;
