/**
 * src/modules/social/social.routes.ts
 *
 * WHY:
 * - Declares Social module endpoints.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { SocialController } from './social.controller';

export function registerSocialRoutes(app: FastifyInstance, controller: SocialController) {
  app.get('/users/:username', controller.profile.bind(controller));

  app.post('/users/:username/follow', controller.follow.bind(controller));
  app.delete('/users/:username/follow', controller.unfollow.bind(controller));
  app.get('/users/:username/followers', controller.followers.bind(controller));
  app.get('/users/:username/following', controller.following.bind(controller));

  app.post('/users/:username/ratings', controller.rate.bind(controller));
  app.get('/users/:username/rating', controller.rating.bind(controller));
}
