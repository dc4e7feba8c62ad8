/**
 * src/shared/store/inmem-document-store.ts
 *
 * WHY:
 * - Lets unit tests (and throwaway local runs) exercise modules without touching disk.
 * - Stores serialized text, not objects, so callers never share references with the
 *   store and tests can plant malformed documents via putRaw().
 *
 * HOW TO USE:
 * - const store = new InMemDocumentStore()
 * - store.putRaw('Volunteer/bob/user_data.json', '{ not json')
 */

import {
  joinDocumentPath,
  parseDocument,
  serializeDocument,
  type DocumentMutator,
  type DocumentStore,
  type JsonObject,
  type ReadResult,
} from './document-store';
import { PathLock } from './path-lock';
import { StorageError } from './store.errors';

export class InMemDocumentStore implements DocumentStore {
  private readonly files = new Map<string, string>();
  private readonly lock = new PathLock();

  read(docPath: string): Promise<ReadResult> {
    const raw = this.files.get(joinDocumentPath(docPath));
    if (raw === undefined) return Promise.resolve({ status: 'missing' });
    return Promise.resolve(parseDocument(raw));
  }

  async load(docPath: string): Promise<JsonObject> {
    const result = await this.read(docPath);
    return result.status === 'ok' ? result.document : {};
  }

  save(docPath: string, document: JsonObject): Promise<void> {
    this.files.set(joinDocumentPath(docPath), serializeDocument(document));
    return Promise.resolve();
  }

  async update<R>(docPath: string, mutate: DocumentMutator<R>): Promise<R> {
    return this.lock.runExclusive(joinDocumentPath(docPath), async () => {
      const result = await this.read(docPath);
      if (result.status === 'malformed') {
        throw new StorageError('update', docPath, new Error(result.reason));
      }

      const document = result.status === 'ok' ? result.document : {};
      const outcome = mutate(document);

      if (outcome.write) {
        await this.save(docPath, document);
      }

      return outcome.value;
    });
  }

  list(dir: string): Promise<string[]> {
    const prefix = joinDocumentPath(dir);
    const paths = Array.from(this.files.keys()).filter(
      (key) => prefix === '' || key.startsWith(`${prefix}/`),
    );
    return Promise.resolve(paths);
  }

  /** Test helper: store raw text as-is (may be invalid JSON). */
  putRaw(docPath: string, raw: string): void {
    this.files.set(joinDocumentPath(docPath), raw);
  }

  /** Test helper: raw text currently stored at a path. */
  getRaw(docPath: string): string | undefined {
    return this.files.get(joinDocumentPath(docPath));
  }
}
