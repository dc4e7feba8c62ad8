/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the backend application.
 * - Keeps startup logic small: load config -> build app -> listen.
 * - Owns process signals (shutdown, directory refresh).
 */

import { buildConfig } from './app/config';
import { buildApp } from './app/build-app';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const config = buildConfig();
  const { app, deps, close } = await buildApp(config);

  await app.listen({ port: config.port, host: '0.0.0.0' });

  logger.info('server.listening', {
    port: config.port,
    env: config.nodeEnv,
    service: config.serviceName,
    dataRoot: config.dataRoot,
  });

  const shutdown = async (signal: string) => {
    logger.info('server.shutdown', { signal });
    await close();
    process.exit(0);
  };

  // SIGHUP: re-read the corpus after accounts were copied in or edited by hand.
  process.on('SIGHUP', () => {
    deps.directory.directory.refresh().then(
      () => logger.info('directory.refreshed', { flow: 'app.signal' }),
      (err: unknown) => logger.error('directory.refresh_failed', { flow: 'app.signal', err }),
    );
  });

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exit(1);
});
