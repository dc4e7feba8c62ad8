/**
 * src/shared/logger/with-context.ts
 *
 * Child logger carrying requestId, host and the resolved account (username, role).
 * Usage inside a handler: `withRequestContext(req).warn('app_error', { flow: 'http.error' })`.
 * Before the auth hook has run, username and role are null.
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  return logger.child({
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
    username: req.authContext?.username ?? null,
    role: req.authContext?.role ?? null,
  });
}
