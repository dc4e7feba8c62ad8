/**
 * src/modules/applications/application.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ApplicationErrors = {
  applicationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Application not found', meta);
  },

  notCreator(meta?: AppErrorMeta) {
    return AppError.forbidden('Only the creator can modify this application.', meta);
  },

  /** Volunteers can only sign up while the application is open. */
  applicationNotOpen(meta?: AppErrorMeta) {
    return AppError.conflict('This application is not open for volunteers.', meta);
  },
} as const;
