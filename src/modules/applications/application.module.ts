/**
 * src/modules/applications/application.module.ts
 *
 * WHY:
 * - Encapsulates Applications module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { Logger } from '../../shared/logger/logger';

import { ApplicationRepo } from './dal/application.repo';
import { ApplicationService } from './application.service';
import { ApplicationController } from './application.controller';
import { registerApplicationRoutes } from './application.routes';

export type ApplicationModule = ReturnType<typeof createApplicationModule>;

export function createApplicationModule(deps: { store: DocumentStore; logger: Logger }) {
  const applicationRepo = new ApplicationRepo(deps.store, deps.logger);
  const applicationService = new ApplicationService({ applicationRepo, logger: deps.logger });
  const controller = new ApplicationController(applicationService);

  return {
    applicationService,
    registerRoutes(app: FastifyInstance) {
      registerApplicationRoutes(app, controller);
    },
  };
}
