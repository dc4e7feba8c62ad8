/**
 * src/modules/events/event.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const EventErrors = {
  eventNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Event not found', meta);
  },

  notCreator(meta?: AppErrorMeta) {
    return AppError.forbidden('Only the creator can modify this event.', meta);
  },
} as const;
