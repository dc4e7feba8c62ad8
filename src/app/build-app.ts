/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> server -> routes -> warm directory
 * - Makes E2E tests simple (build once, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps, type BuildDepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: BuildDepsOverrides = {}) {
  const deps = buildDeps(config, overrides);
  const app = buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // Build the token/username index before the first request (no-op for the scan).
  await deps.directory.directory.warm();
  logger.info('directory.ready', { flow: 'app.boot', mode: config.directoryIndex });

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
