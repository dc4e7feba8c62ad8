/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/register', controller.register.bind(controller));
  app.post('/auth/login', controller.login.bind(controller));

  app.get('/auth/me', controller.me.bind(controller));
  app.post('/auth/change-password', controller.changePassword.bind(controller));
  app.patch('/auth/profile', controller.updateProfile.bind(controller));

  app.get('/auth/skills', controller.getSkills.bind(controller));
  app.put('/auth/skills', controller.setSkills.bind(controller));
}
