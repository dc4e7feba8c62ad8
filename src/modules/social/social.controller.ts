/**
 * src/modules/social/social.controller.ts
 *
 * WHY:
 * - Maps HTTP -> SocialService for the /users/:username/* endpoints.
 *
 * RULES:
 * - No store access here.
 * - No business rules here (follow eligibility lives in policies/).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { SocialService } from './social.service';
import { rateSchema, usernameParamsSchema } from './social.schemas';

function parseTarget(req: FastifyRequest): string {
  const parsed = usernameParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw AppError.validationError('Invalid username', { issues: parsed.error.issues });
  }
  return parsed.data.username;
}

export class SocialController {
  constructor(private readonly socialService: SocialService) {}

  async follow(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'VOLUNTEER' });
    const followee = parseTarget(req);

    const result = await this.socialService.follow({ follower: session.username, followee });
    return reply.status(200).send(result);
  }

  async unfollow(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'VOLUNTEER' });
    const followee = parseTarget(req);

    const result = await this.socialService.unfollow({ follower: session.username, followee });
    return reply.status(200).send(result);
  }

  async followers(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);
    const username = parseTarget(req);

    const followers = await this.socialService.getFollowers(username);
    return reply.status(200).send({ username, followers });
  }

  async following(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);
    const username = parseTarget(req);

    const following = await this.socialService.getFollowing(username);
    return reply.status(200).send({ username, following });
  }

  async rate(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const ratee = parseTarget(req);

    const parsed = rateSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const rating = await this.socialService.rate({
      rater: session.username,
      ratee,
      score: parsed.data.rate,
      comment: parsed.data.comment,
    });
    return reply.status(201).send(rating);
  }

  async rating(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);
    const username = parseTarget(req);

    const summary = await this.socialService.getRatings(username);
    return reply.status(200).send(summary);
  }

  async profile(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req);
    const username = parseTarget(req);

    const profile = await this.socialService.getProfile(username);
    return reply.status(200).send(profile);
  }
}
