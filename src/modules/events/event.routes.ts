/**
 * src/modules/events/event.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { EventController } from './event.controller';

export function registerEventRoutes(app: FastifyInstance, controller: EventController) {
  app.post('/events', controller.create.bind(controller));
  app.get('/events', controller.list.bind(controller));
  app.get('/events/:id', controller.get.bind(controller));
  app.put('/events/:id', controller.update.bind(controller));
  app.delete('/events/:id', controller.remove.bind(controller));

  app.post('/events/:id/participants', controller.join.bind(controller));
  app.post('/events/:id/comments', controller.comment.bind(controller));
}
