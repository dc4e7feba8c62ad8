/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Global request + auth context are attached here; module routes come from app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { roleForToken } from '../modules/users/user.paths';

export function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 1024 * 1024,
  });

  registerRequestContext(app);

  // Bearer token -> { username, role } through the directory index.
  // The prefix must name a role, and the account found must hold that role.
  registerAuthContext(app, async (token) => {
    const claimed = roleForToken(token);
    if (!claimed) return undefined;

    const entry = await opts.deps.directory.directory.findByToken(token);
    if (!entry || entry.role !== claimed) return undefined;
    return { username: entry.user.username, role: entry.role };
  });

  registerErrorHandler(app);

  // Basic request logging (requestId + host; never the query string, it may carry a token)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.routeOptions.url ?? req.url.split('?')[0],
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  return app;
}
