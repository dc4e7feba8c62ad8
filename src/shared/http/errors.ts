/**
 * src/shared/http/errors.ts
 *
 * WHY:
 * - One transport error for every expected failure: a stable code, its HTTP status,
 *   a client-safe message, and optional meta that is logged but never returned.
 *
 * RULES:
 * - Status comes from the code (APP_ERROR_STATUS); callers never pick a number.
 * - Module-specific messages live in each module's *.errors.ts (users, auth, social, ...).
 * - Storage I/O failures are NOT AppErrors (see shared/store/store.errors.ts).
 */

export const APP_ERROR_STATUS = {
  VALIDATION_ERROR: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  RATE_LIMITED: 429,
  INTERNAL: 500,
} as const;

export type AppErrorCode = keyof typeof APP_ERROR_STATUS;
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly status: number;

  constructor(
    readonly code: AppErrorCode,
    message: string,
    readonly meta?: AppErrorMeta,
  ) {
    super(message);
    this.name = 'AppError';
    this.status = APP_ERROR_STATUS[code];
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError('VALIDATION_ERROR', message, meta);
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError('UNAUTHORIZED', message, meta);
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError('FORBIDDEN', message, meta);
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError('NOT_FOUND', message, meta);
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta) {
    return new AppError('CONFLICT', message, meta);
  }
}
