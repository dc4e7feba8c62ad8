/**
 * src/modules/events/policies/event.policy.ts
 *
 * WHY:
 * - Pure ownership rules for events.
 */

import type { CommunityEvent } from '../event.types';
import { EventErrors } from '../event.errors';

export function assertEventExists(
  event: CommunityEvent | undefined,
  id: string,
): asserts event is CommunityEvent {
  if (!event) throw EventErrors.eventNotFound({ eventId: id });
}

export function assertIsEventCreator(event: CommunityEvent, username: string): void {
  if (event.whoCreated !== username) {
    throw EventErrors.notCreator({ eventId: event.id, username });
  }
}
