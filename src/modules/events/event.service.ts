/**
 * src/modules/events/event.service.ts
 *
 * WHY:
 * - Event lifecycle (create, edit, soft delete) plus participation and comments.
 *
 * RULES:
 * - Ids are UUID v4; created_at is set once at creation.
 * - update() copies only EventPatch fields: id, created_at and who_created in a
 *   payload are ignored whatever they say.
 * - create() also appends the id to the creator's `events` list. That is a second
 *   document: if it fails, the event is soft-deleted (compensation) and the error
 *   is rethrown. A failed soft delete is only logged; the link error still wins.
 * - addParticipant()/addComment() answer with booleans (false = nothing written).
 */

import { randomUUID } from 'node:crypto';

import type { Logger } from '../../shared/logger/logger';
import type { UserRepo } from '../users/dal/user.repo';
import { UserErrors } from '../users/user.errors';
import type { UserRole } from '../users/user.types';

import type { EventRepo } from './dal/event.repo';
import { assertEventExists, assertIsEventCreator } from './policies/event.policy';
import type {
  CommunityEvent,
  EventListFilter,
  EventPatch,
  NewEventInput,
} from './event.types';

function applyPatch(current: CommunityEvent, patch: EventPatch): CommunityEvent {
  return {
    ...current,
    title: patch.title ?? current.title,
    description: patch.description ?? current.description,
    date: patch.date !== undefined ? patch.date : current.date,
    location: patch.location !== undefined ? patch.location : current.location,
    status: patch.status ?? current.status,
  };
}

export class EventService {
  constructor(
    private readonly deps: {
      eventRepo: EventRepo;
      userRepo: UserRepo;
      logger: Logger;
      now?: () => Date;
    },
  ) {}

  private nowIso(): string {
    return (this.deps.now?.() ?? new Date()).toISOString();
  }

  async create(params: {
    creator: string;
    creatorRole: UserRole;
    input: NewEventInput;
  }): Promise<CommunityEvent> {
    const event = await this.deps.eventRepo.insert({
      id: randomUUID(),
      title: params.input.title,
      description: params.input.description,
      date: params.input.date,
      location: params.input.location,
      createdAt: this.nowIso(),
      whoCreated: params.creator,
      status: params.input.status ?? 'active',
      participants: [],
      comments: [],
    });

    try {
      const linked = await this.deps.userRepo.addToList({
        role: params.creatorRole,
        username: params.creator,
        field: 'events',
        value: event.id,
      });
      if (linked === 'missing') throw UserErrors.userNotFound({ username: params.creator });
    } catch (err) {
      this.deps.logger.error({
        msg: 'events.create.link_failed',
        flow: 'events.create',
        eventId: event.id,
        username: params.creator,
        err,
      });
      try {
        await this.deps.eventRepo.modify(event.id, (current) => ({ ...current, status: 'deleted' }));
      } catch (undoErr) {
        this.deps.logger.error({
          msg: 'events.create.compensation_failed',
          flow: 'events.create',
          eventId: event.id,
          err: undoErr,
        });
      }
      throw err;
    }

    this.deps.logger.info({
      msg: 'events.created',
      flow: 'events.create',
      eventId: event.id,
      username: params.creator,
    });

    return event;
  }

  async list(filter: EventListFilter = {}): Promise<CommunityEvent[]> {
    const all = await this.deps.eventRepo.listAll();
    return all.filter(
      (event) =>
        (!filter.status || event.status === filter.status) &&
        (!filter.creator || event.whoCreated === filter.creator),
    );
  }

  async get(id: string): Promise<CommunityEvent> {
    const event = await this.deps.eventRepo.findById(id);
    assertEventExists(event, id);
    return event;
  }

  async update(params: { id: string; actor: string; patch: EventPatch }): Promise<CommunityEvent> {
    const result = await this.deps.eventRepo.modify(params.id, (current) => {
      assertIsEventCreator(current, params.actor);
      return applyPatch(current, params.patch);
    });

    const event = result.status === 'not_found' ? undefined : result.item;
    assertEventExists(event, params.id);

    this.deps.logger.info({
      msg: 'events.updated',
      flow: 'events.update',
      eventId: params.id,
      username: params.actor,
    });

    return event;
  }

  async softDelete(params: { id: string; actor: string }): Promise<CommunityEvent> {
    const result = await this.deps.eventRepo.modify(params.id, (current) => {
      assertIsEventCreator(current, params.actor);
      if (current.status === 'deleted') return undefined;
      return { ...current, status: 'deleted' };
    });

    const event = result.status === 'not_found' ? undefined : result.item;
    assertEventExists(event, params.id);

    this.deps.logger.info({
      msg: 'events.deleted',
      flow: 'events.delete',
      eventId: params.id,
      username: params.actor,
    });

    return event;
  }

  /** false when the event is missing or the user already participates. */
  async addParticipant(params: { id: string; username: string }): Promise<boolean> {
    const result = await this.deps.eventRepo.modify(params.id, (current) => {
      if (current.participants.includes(params.username)) return undefined;
      return { ...current, participants: [...current.participants, params.username] };
    });
    return result.status === 'updated';
  }

  /** Stamps the comment with the current time. false when the event is missing. */
  async addComment(params: { id: string; author: string; text: string }): Promise<boolean> {
    const timestamp = this.nowIso();

    const result = await this.deps.eventRepo.modify(params.id, (current) => ({
      ...current,
      comments: [...current.comments, { author: params.author, text: params.text, timestamp }],
    }));

    if (result.status === 'updated') {
      this.deps.logger.info({
        msg: 'events.comment_added',
        flow: 'events.comment',
        eventId: params.id,
        username: params.author,
      });
    }

    return result.status === 'updated';
  }
}
