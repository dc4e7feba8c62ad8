/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP -> AuthService for all /auth endpoints.
 * - Returns the bearer token on register/login; every other endpoint expects it.
 *
 * RULES:
 * - No store access here.
 * - No business rules here.
 * - Login reads Basic credentials from the Authorization header, never from the body.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { AuthService } from './auth.service';
import { AuthErrors } from './auth.errors';
import { parseBasicCredentials } from './helpers/parse-basic-credentials';
import {
  changePasswordSchema,
  registerSchema,
  setSkillsSchema,
  updateProfileSchema,
} from './auth.schemas';

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.register({
      ...parsed.data,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const credentials = parseBasicCredentials(req.headers.authorization);
    if (!credentials) {
      throw AuthErrors.missingCredentials();
    }

    const result = await this.authService.login({
      ...credentials,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const profile = await this.authService.me(session);
    return reply.status(200).send(profile);
  }

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = changePasswordSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    await this.authService.changePassword(session, parsed.data);
    return reply.status(200).send({ status: 'PASSWORD_CHANGED' });
  }

  async updateProfile(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = updateProfileSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const profile = await this.authService.updateProfile(session, parsed.data);
    return reply.status(200).send(profile);
  }

  async getSkills(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'VOLUNTEER' });

    const skills = await this.authService.getSkills(session);
    return reply.status(200).send({ skills });
  }

  async setSkills(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'VOLUNTEER' });

    const parsed = setSkillsSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const skills = await this.authService.setSkills(session, parsed.data.skills);
    return reply.status(200).send({ skills });
  }
}
