/**
 * src/modules/events/dal/event.repo.ts
 *
 * WHY:
 * - DAL for the shared events collection document.
 *
 * RULES:
 * - No AppError.
 * - `change` callbacks run under the collection lock.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { Logger } from '../../../shared/logger/logger';
import { Collection, type ModifyResult } from '../../../shared/store/collection';
import type { CommunityEvent } from '../event.types';
import {
  EVENTS_DOCUMENT,
  EVENTS_KEY,
  eventDocumentSchema,
  toEvent,
  toEventDocument,
  type EventDocument,
} from './event.document';

export class EventRepo {
  private readonly collection: Collection<EventDocument>;

  constructor(store: DocumentStore, logger?: Logger) {
    this.collection = new Collection({
      store,
      path: EVENTS_DOCUMENT,
      key: EVENTS_KEY,
      schema: eventDocumentSchema,
      logger,
    });
  }

  async listAll(): Promise<CommunityEvent[]> {
    const docs = await this.collection.all();
    return docs.map(toEvent);
  }

  async findById(id: string): Promise<CommunityEvent | undefined> {
    const doc = await this.collection.find((item) => item.id === id);
    return doc ? toEvent(doc) : undefined;
  }

  async insert(event: CommunityEvent): Promise<CommunityEvent> {
    const doc = await this.collection.append(() => toEventDocument(event));
    return toEvent(doc);
  }

  async modify(
    id: string,
    change: (current: CommunityEvent) => CommunityEvent | undefined,
  ): Promise<ModifyResult<CommunityEvent>> {
    const result = await this.collection.modifyFirst(
      (item) => item.id === id,
      (item) => {
        const next = change(toEvent(item));
        return next ? { write: true, next: toEventDocument(next) } : { write: false };
      },
    );

    if (result.status === 'not_found') return result;
    return { status: result.status, item: toEvent(result.item) };
  }
}
