/**
 * src/modules/events/event.controller.ts
 *
 * WHY:
 * - Maps HTTP -> EventService.
 *
 * RULES:
 * - Any authenticated user may create, join or comment on events.
 * - Boolean service answers become 201 (written) / 200 (nothing to do) / 404.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import type { EventService } from './event.service';
import { EventErrors } from './event.errors';
import {
  createEventSchema,
  eventCommentSchema,
  eventIdParamsSchema,
  eventListQuerySchema,
  updateEventSchema,
} from './event.schemas';

function parseId(req: FastifyRequest): string {
  const parsed = eventIdParamsSchema.safeParse(req.params);
  if (!parsed.success) {
    throw AppError.validationError('Invalid event id', { issues: parsed.error.issues });
  }
  return parsed.data.id;
}

export class EventController {
  constructor(private readonly eventService: EventService) {}

  async create(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = createEventSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const event = await this.eventService.create({
      creator: session.username,
      creatorRole: session.role,
      input: {
        title: parsed.data.title,
        description: parsed.data.description,
        date: parsed.data.date ?? null,
        location: parsed.data.location ?? null,
        status: parsed.data.status,
      },
    });
    return reply.status(201).send(event);
  }

  async list(req: FastifyRequest, reply: FastifyReply) {
    const parsed = eventListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query', { issues: parsed.error.issues });
    }

    const events = await this.eventService.list(parsed.data);
    return reply.status(200).send({ events });
  }

  async get(req: FastifyRequest, reply: FastifyReply) {
    const event = await this.eventService.get(parseId(req));
    return reply.status(200).send(event);
  }

  async update(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const id = parseId(req);

    const parsed = updateEventSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const event = await this.eventService.update({
      id,
      actor: session.username,
      patch: parsed.data,
    });
    return reply.status(200).send(event);
  }

  async remove(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const event = await this.eventService.softDelete({ id: parseId(req), actor: session.username });
    return reply.status(200).send(event);
  }

  async join(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const id = parseId(req);

    const joined = await this.eventService.addParticipant({ id, username: session.username });
    if (!joined) {
      // Distinguish "already in" from "no such event".
      await this.eventService.get(id);
      return reply.status(200).send({ status: 'ALREADY_PARTICIPATING' });
    }
    return reply.status(201).send({ status: 'JOINED' });
  }

  async comment(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const id = parseId(req);

    const parsed = eventCommentSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const added = await this.eventService.addComment({
      id,
      author: session.username,
      text: parsed.data.text,
    });
    if (!added) {
      throw EventErrors.eventNotFound({ eventId: id });
    }
    return reply.status(201).send({ status: 'COMMENTED' });
  }
}
