/**
 * src/shared/store/collection.ts
 *
 * WHY:
 * - Applications and events live in ONE shared document each
 *   ({ "applications": [...] }, { "events": [...] }), not one file per record.
 * - Both need the same primitives: validated read, linear find, append, replace-in-place.
 *
 * RULES:
 * - Every mutation runs inside DocumentStore.update(), i.e. under the per-path lock,
 *   so "max id + 1" and read-modify-write on the list cannot interleave in-process.
 * - Items failing the schema are skipped on read (logged) and left untouched on write.
 * - Lookups are linear scans. There is no secondary index for collections.
 */

import type { z } from 'zod';
import type { Logger } from '../logger/logger';
import type { DocumentStore, JsonObject, JsonValue } from './document-store';

export type ModifyResult<T> =
  | { status: 'not_found' }
  | { status: 'unchanged'; item: T }
  | { status: 'updated'; item: T };

export type ItemChange<T> = { write: false } | { write: true; next: T };

export class Collection<T extends JsonObject> {
  constructor(
    private readonly deps: {
      store: DocumentStore;
      path: string;
      key: string;
      schema: z.ZodType<T, z.ZodTypeDef, unknown>;
      logger?: Logger;
    },
  ) {}

  private itemsOf(document: JsonObject): JsonValue[] {
    const raw = document[this.deps.key];
    if (Array.isArray(raw)) return raw;

    const fresh: JsonValue[] = [];
    document[this.deps.key] = fresh;
    return fresh;
  }

  private parse(raw: JsonValue, index: number): T | undefined {
    const result = this.deps.schema.safeParse(raw);
    if (result.success) return result.data;

    this.deps.logger?.warn({
      msg: 'store.collection_item_invalid',
      flow: 'store.collection',
      path: this.deps.path,
      index,
      issues: result.error.issues.map((i) => i.path.join('.')),
    });
    return undefined;
  }

  async all(): Promise<T[]> {
    const document = await this.deps.store.load(this.deps.path);
    const raw = document[this.deps.key];
    if (!Array.isArray(raw)) return [];

    const items: T[] = [];
    raw.forEach((entry, index) => {
      const item = this.parse(entry, index);
      if (item) items.push(item);
    });
    return items;
  }

  async find(match: (item: T) => boolean): Promise<T | undefined> {
    const items = await this.all();
    return items.find(match);
  }

  async filter(match: (item: T) => boolean): Promise<T[]> {
    const items = await this.all();
    return items.filter(match);
  }

  /**
   * Appends the item produced by `build`. `build` sees the current valid items,
   * under the lock, so it may derive ids from them.
   */
  async append(build: (existing: readonly T[]) => T): Promise<T> {
    return this.deps.store.update(this.deps.path, (document) => {
      const raw = this.itemsOf(document);
      const existing: T[] = [];
      raw.forEach((entry, index) => {
        const item = this.parse(entry, index);
        if (item) existing.push(item);
      });

      const created = build(existing);
      raw.push(created);
      return { write: true, value: created };
    });
  }

  /** Applies `change` to the first item matching `match`; writes only when asked to. */
  async modifyFirst(
    match: (item: T) => boolean,
    change: (item: T) => ItemChange<T>,
  ): Promise<ModifyResult<T>> {
    return this.deps.store.update<ModifyResult<T>>(this.deps.path, (document) => {
      const raw = this.itemsOf(document);

      for (let index = 0; index < raw.length; index++) {
        const entry = raw[index];
        if (entry === undefined) continue;

        const item = this.parse(entry, index);
        if (!item || !match(item)) continue;

        const outcome = change(item);
        if (!outcome.write) {
          return { write: false, value: { status: 'unchanged', item } };
        }

        raw[index] = outcome.next;
        return { write: true, value: { status: 'updated', item: outcome.next } };
      }

      return { write: false, value: { status: 'not_found' } };
    });
  }
}
