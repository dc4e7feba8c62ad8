/**
 * src/modules/applications/dal/application.repo.ts
 *
 * WHY:
 * - DAL for the shared applications collection document.
 *
 * RULES:
 * - No AppError (the service decides what "not found" means).
 * - Ids are sequential: max existing id + 1, computed under the collection lock.
 * - `change` callbacks run under the lock; throwing from one aborts the write.
 */

import type { DocumentStore } from '../../../shared/store/document-store';
import type { Logger } from '../../../shared/logger/logger';
import { Collection, type ModifyResult } from '../../../shared/store/collection';
import type { Application } from '../application.types';
import {
  APPLICATIONS_DOCUMENT,
  APPLICATIONS_KEY,
  applicationDocumentSchema,
  toApplication,
  toApplicationDocument,
  type ApplicationDocument,
} from './application.document';

export function nextApplicationId(existing: readonly { id: number }[]): number {
  return existing.reduce((max, item) => Math.max(max, item.id), 0) + 1;
}

export class ApplicationRepo {
  private readonly collection: Collection<ApplicationDocument>;

  constructor(store: DocumentStore, logger?: Logger) {
    this.collection = new Collection({
      store,
      path: APPLICATIONS_DOCUMENT,
      key: APPLICATIONS_KEY,
      schema: applicationDocumentSchema,
      logger,
    });
  }

  async listAll(): Promise<Application[]> {
    const docs = await this.collection.all();
    return docs.map(toApplication);
  }

  async findById(id: number): Promise<Application | undefined> {
    const doc = await this.collection.find((item) => item.id === id);
    return doc ? toApplication(doc) : undefined;
  }

  async insert(build: (id: number) => Application): Promise<Application> {
    const doc = await this.collection.append((existing) =>
      toApplicationDocument(build(nextApplicationId(existing))),
    );
    return toApplication(doc);
  }

  /** `change` returns the replacement, or undefined to leave the item as it is. */
  async modify(
    id: number,
    change: (current: Application) => Application | undefined,
  ): Promise<ModifyResult<Application>> {
    const result = await this.collection.modifyFirst(
      (item) => item.id === id,
      (item) => {
        const next = change(toApplication(item));
        return next ? { write: true, next: toApplicationDocument(next) } : { write: false };
      },
    );

    if (result.status === 'not_found') return result;
    return { status: result.status, item: toApplication(result.item) };
  }
}
