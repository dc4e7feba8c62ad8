/**
 * src/modules/applications/application.controller.ts
 *
 * WHY:
 * - Maps HTTP -> ApplicationService.
 *
 * RULES:
 * - Role gates here (organizers create/manage, volunteers sign up).
 * - Ownership rules live in the service (they need the stored record).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { ApplicationService } from './application.service';
import type { ApplicationInput } from './application.types';
import {
  applicationBodySchema,
  applicationIdParamsSchema,
  applicationListQuerySchema,
  applicationStatusBodySchema,
  type ApplicationBody,
} from './application.schemas';

function parseId(req: FastifyRequest): number {
  const parsed = applicationIdParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw AppError.validationError('Invalid application id', { issues: parsed.error.issues });
  }
  return parsed.data.id;
}

function parseInput(req: FastifyRequest): ApplicationInput {
  const parsed = applicationBodySchema.safeParse(req.body);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
  }
  return toInput(parsed.data);
}

function toInput(body: ApplicationBody): ApplicationInput {
  return {
    title: body.title,
    description: body.description,
    location: body.location,
    skills: body.skills,
    startTime: body.start_time,
    endTime: body.end_time,
    reward: body.reward,
  };
}

export class ApplicationController {
  constructor(private readonly applicationService: ApplicationService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ORGANIZER' });
    const input = parseInput(req);

    const app = await this.applicationService.create({ creator: session.username, input });
    return reply.status(201).send(app);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const parsed = applicationListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query', { issues: parsed.error.issues });
    }

    const apps = await this.applicationService.list(parsed.data);
    return reply.status(200).send({ applications: apps });
  }

  async mine(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const apps = await this.applicationService.listByCreator(session.username);
    return reply.status(200).send({ applications: apps });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const app = await this.applicationService.get(parseId(req));
    return reply.status(200).send(app);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ORGANIZER' });
    const id = parseId(req);
    const input = parseInput(req);

    const app = await this.applicationService.update({ id, actor: session.username, input });
    return reply.status(200).send(app);
  }

  async updateStatus(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ORGANIZER' });
    const id = parseId(req);

    const parsed = applicationStatusBodySchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const app = await this.applicationService.updateStatus({
      id,
      actor: session.username,
      status: parsed.data.status,
    });
    return reply.status(200).send(app);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'ORGANIZER' });

    const app = await this.applicationService.softDelete({
      id: parseId(req),
      actor: session.username,
    });
    return reply.status(200).send(app);
  }

  async assignVolunteer(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { role: 'VOLUNTEER' });

    const assigned = await this.applicationService.assignVolunteer({
      id: parseId(req),
      volunteer: session.username,
    });
    return reply.status(assigned ? 201 : 200).send({
      status: assigned ? 'ASSIGNED' : 'ALREADY_ASSIGNED',
    });
  }

  async volunteers(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { role: 'ORGANIZER' });
    const id = parseId(req);

    const volunteers = await this.applicationService.getVolunteers(id);
    return reply.status(200).send({ id, volunteers });
  }
}
