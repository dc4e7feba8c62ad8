/**
 * src/modules/applications/application.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - Static segments (/mine) are registered before /:id for readability;
 *   Fastify's router prefers them either way.
 */

import type { FastifyInstance } from 'fastify';
import type { ApplicationController } from './application.controller';

export function registerApplicationRoutes(app: FastifyInstance, controller: ApplicationController) {
  app.post('/applications', controller.create.bind(controller));
  app.get('/applications', controller.list.bind(controller));
  app.get('/applications/mine', controller.mine.bind(controller));

  app.get('/applications/:id', controller.get.bind(controller));
  app.put('/applications/:id', controller.update.bind(controller));
  app.patch('/applications/:id/status', controller.updateStatus.bind(controller));
  app.delete('/applications/:id', controller.remove.bind(controller));

  app.post('/applications/:id/volunteers', controller.assignVolunteer.bind(controller));
  app.get('/applications/:id/volunteers', controller.volunteers.bind(controller));
}
