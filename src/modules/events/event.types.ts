/**
 * src/modules/events/event.types.ts
 *
 * WHY:
 * - Domain types for community events (participants + comment thread).
 */

export const EVENT_STATUSES = ['active', 'deleted'] as const;

export type EventStatus = (typeof EVENT_STATUSES)[number];

export type EventComment = {
  author: string;
  text: string;
  timestamp: string;
};

export type CommunityEvent = {
  id: string;
  title: string;
  description: string;
  date: string | null;
  location: string | null;
  createdAt: string;
  whoCreated: string;
  status: EventStatus;
  participants: string[];
  comments: EventComment[];
};

export type NewEventInput = {
  title: string;
  description: string;
  date: string | null;
  location: string | null;
  status?: EventStatus;
};

/** Editable fields. id, created_at and who_created are never taken from a patch. */
export type EventPatch = {
  title?: string;
  description?: string;
  date?: string | null;
  location?: string | null;
  status?: EventStatus;
};

export type EventListFilter = {
  status?: EventStatus;
  creator?: string;
};
