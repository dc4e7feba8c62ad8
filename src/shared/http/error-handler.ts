/**
 * src/shared/http/error-handler.ts
 *
 * WHY:
 * - Every failure leaves the API as `{ error: { code, message } }`, whatever threw it.
 * - Internal details (meta, stack traces, document paths) must never reach clients.
 *
 * MAPPING (first match wins):
 * - AppError        -> its own status + code.
 * - RateLimitError  -> 429 RATE_LIMITED.
 * - StorageError    -> 500 STORAGE_FAILURE (operation + path are logged, not returned).
 * - Fastify 4xx     -> e.g. malformed JSON body, passed through as VALIDATION_ERROR.
 * - Anything else   -> 500 INTERNAL with a generic message.
 */

import type { FastifyError, FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { APP_ERROR_STATUS, AppError, type AppErrorCode } from './errors';
import { RateLimitError } from '../security/rate-limit';
import { StorageError } from '../store/store.errors';
import { redactSensitive } from '../logger/logger';
import { withRequestContext } from '../logger/with-context';

type ErrorResponseCode = AppErrorCode | 'STORAGE_FAILURE';

type ErrorResponseBody = {
  error: {
    code: ErrorResponseCode;
    message: string;
  };
};

type MappedError = {
  status: number;
  code: ErrorResponseCode;
  message: string;
  level: 'warn' | 'error';
  event: string;
  logMeta: Record<string, unknown>;
};

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function mapError(err: FastifyError): MappedError {
  if (err instanceof AppError) {
    return {
      status: err.status,
      code: err.code,
      message: err.message,
      level: 'warn',
      event: 'app_error',
      logMeta: { meta: redactSensitive(err.meta) },
    };
  }

  if (err instanceof RateLimitError) {
    return {
      status: APP_ERROR_STATUS.RATE_LIMITED,
      code: 'RATE_LIMITED',
      message: 'Too many requests. Try again later.',
      level: 'warn',
      event: 'rate_limit',
      logMeta: { key: err.key, limit: err.limit, windowSeconds: err.windowSeconds },
    };
  }

  if (err instanceof StorageError) {
    return {
      status: 500,
      code: 'STORAGE_FAILURE',
      message: 'Storage is temporarily unavailable.',
      level: 'error',
      event: 'storage_error',
      logMeta: {
        operation: err.operation,
        path: err.documentPath,
        cause: describeCause(err.cause),
      },
    };
  }

  const status = err.statusCode;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return {
      status,
      code: 'VALIDATION_ERROR',
      message: err.message,
      level: 'warn',
      event: 'client_error',
      logMeta: {},
    };
  }

  return {
    status: APP_ERROR_STATUS.INTERNAL,
    code: 'INTERNAL',
    message: 'Internal server error',
    level: 'error',
    event: 'unhandled_error',
    logMeta: { cause: err.message, stack: err.stack },
  };
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const mapped = mapError(err);

    withRequestContext(req)[mapped.level](mapped.event, {
      flow: 'http.error',
      status: mapped.status,
      code: mapped.code,
      ...mapped.logMeta,
    });

    const body: ErrorResponseBody = { error: { code: mapped.code, message: mapped.message } };
    return reply.status(mapped.status).send(body);
  });
}
