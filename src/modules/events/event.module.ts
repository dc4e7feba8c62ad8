/**
 * src/modules/events/event.module.ts
 *
 * WHY:
 * - Encapsulates Events module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { DocumentStore } from '../../shared/store/document-store';
import type { Logger } from '../../shared/logger/logger';
import type { UserRepo } from '../users/dal/user.repo';

import { EventRepo } from './dal/event.repo';
import { EventService } from './event.service';
import { EventController } from './event.controller';
import { registerEventRoutes } from './event.routes';

export type EventModule = ReturnType<typeof createEventModule>;

export function createEventModule(deps: {
  store: DocumentStore;
  userRepo: UserRepo;
  logger: Logger;
}) {
  const eventRepo = new EventRepo(deps.store, deps.logger);
  const eventService = new EventService({ eventRepo, userRepo: deps.userRepo, logger: deps.logger });
  const controller = new EventController(eventService);

  return {
    eventService,
    registerRoutes(app: FastifyInstance) {
      registerEventRoutes(app, controller);
    },
  };
}
