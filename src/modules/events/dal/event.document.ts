/**
 * src/modules/events/dal/event.document.ts
 *
 * WHY:
 * - events.json items use snake_case keys; this is the ONLY place that knows them.
 */

import { z } from 'zod';
import { EVENT_STATUSES, type CommunityEvent } from '../event.types';

export const EVENTS_DOCUMENT = 'events.json';
export const EVENTS_KEY = 'events';

export const eventCommentDocumentSchema = z.object({
  author: z.string(),
  text: z.string(),
  timestamp: z.string(),
});

export const eventDocumentSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  description: z.string().default(''),
  date: z.string().nullable().default(null),
  location: z.string().nullable().default(null),
  created_at: z.string(),
  who_created: z.string(),
  status: z.enum(EVENT_STATUSES).default('active'),
  participants: z.array(z.string()).default([]),
  comments: z.array(eventCommentDocumentSchema).default([]),
});

export type EventDocument = z.infer<typeof eventDocumentSchema>;

export function toEvent(doc: EventDocument): CommunityEvent {
  return {
    id: doc.id,
    title: doc.title,
    description: doc.description,
    date: doc.date,
    location: doc.location,
    createdAt: doc.created_at,
    whoCreated: doc.who_created,
    status: doc.status,
    participants: doc.participants,
    comments: doc.comments.map((c) => ({ ...c })),
  };
}

export function toEventDocument(event: CommunityEvent): EventDocument {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    date: event.date,
    location: event.location,
    created_at: event.createdAt,
    who_created: event.whoCreated,
    status: event.status,
    participants: event.participants,
    comments: event.comments.map((c) => ({ ...c })),
  };
}
