/**
 * src/modules/social/social.errors.ts
 *
 * WHY:
 * - Social module owns its domain-specific error semantics (follow, ratings).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Unknown users reuse UserErrors.userNotFound (same message everywhere).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const SocialErrors = {
  /** Only volunteers follow; organizers are followed. */
  organizerCannotFollow(meta?: AppErrorMeta) {
    return AppError.forbidden('Organizers cannot follow other users.', meta);
  },

  cannotFollowSelf(meta?: AppErrorMeta) {
    return AppError.validationError('You cannot follow yourself.', meta);
  },
} as const;
