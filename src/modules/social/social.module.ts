/**
 * src/modules/social/social.module.ts
 *
 * WHY:
 * - Encapsulates Social module wiring (follow graph + ratings).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { DirectoryIndex } from '../directory/directory.types';
import type { UserRepo } from '../users/dal/user.repo';

import { SocialService } from './social.service';
import { SocialController } from './social.controller';
import { registerSocialRoutes } from './social.routes';

export type SocialModule = ReturnType<typeof createSocialModule>;

export function createSocialModule(deps: {
  directory: DirectoryIndex;
  userRepo: UserRepo;
  logger: Logger;
}) {
  const socialService = new SocialService(deps);
  const controller = new SocialController(socialService);

  return {
    socialService,
    registerRoutes(app: FastifyInstance) {
      registerSocialRoutes(app, controller);
    },
  };
}
