/**
 * src/modules/events/event.schemas.ts
 *
 * RULES:
 * - Unknown keys (id, created_at, who_created) are stripped by zod, never applied.
 */

import { z } from 'zod';
import { EVENT_STATUSES } from './event.types';

export const eventIdParamsSchema = z.object({
  id: z.string().uuid('Invalid event id'),
});

export const createEventSchema = z.object({
  title: z.string().min(1, 'Title is required').max(200),
  description: z.string().max(5000).default(''),
  date: z.string().min(1).nullish(),
  location: z.string().max(300).nullish(),
  status: z.enum(EVENT_STATUSES).optional(),
});

export const updateEventSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  description: z.string().max(5000).optional(),
  date: z.string().min(1).nullable().optional(),
  location: z.string().max(300).nullable().optional(),
  status: z.enum(EVENT_STATUSES).optional(),
});

export const eventListQuerySchema = z.object({
  status: z.enum(EVENT_STATUSES).optional(),
  creator: z.string().min(1).optional(),
});

export const eventCommentSchema = z.object({
  text: z.string().trim().min(1, 'Comment text is required').max(2000),
});
