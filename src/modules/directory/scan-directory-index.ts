/**
 * src/modules/directory/scan-directory-index.ts
 *
 * WHY:
 * - The corpus itself is the index: walk every <Role>/<username>/user_data.json,
 *   parse it, compare one field, stop at the first match.
 *
 * COST:
 * - O(total accounts) reads per lookup. Traversal order is whatever the store
 *   lists, so with duplicate values the "first" match is not stable.
 *
 * RULES:
 * - Malformed or invalid documents are skipped with a warning, never fatal.
 * - The role comes from the partition directory, not from the document body.
 * - Storage listing failures propagate (StorageError).
 */

import type { DocumentStore } from '../../shared/store/document-store';
import type { Logger } from '../../shared/logger/logger';
import { tokensEqual } from '../../shared/security/token';
import { parseUserDocument } from '../users/dal/user.document';
import { parseUserDocumentPath } from '../users/user.paths';
import type { User } from '../users/user.types';
import type { DirectoryEntry, DirectoryIndex } from './directory.types';

export class ScanDirectoryIndex implements DirectoryIndex {
  constructor(
    private readonly store: DocumentStore,
    private readonly logger: Logger,
  ) {}

  /** Every valid account in store order. */
  async *entries(): AsyncGenerator<DirectoryEntry & { path: string }> {
    const paths = await this.store.list('');

    for (const path of paths) {
      const location = parseUserDocumentPath(path);
      if (!location) continue;

      const result = await this.store.read(path);
      if (result.status === 'missing') continue;

      if (result.status === 'malformed') {
        this.logger.warn({
          msg: 'directory.document_malformed',
          flow: 'directory.scan',
          path,
          reason: result.reason,
        });
        continue;
      }

      const user = parseUserDocument(result.document);
      if (!user) {
        this.logger.warn({ msg: 'directory.document_invalid', flow: 'directory.scan', path });
        continue;
      }

      yield { path, role: location.role, user };
    }
  }

  async find(match: (user: User) => boolean): Promise<DirectoryEntry | undefined> {
    for await (const entry of this.entries()) {
      if (match(entry.user)) {
        return { role: entry.role, user: entry.user };
      }
    }
    return undefined;
  }

  async findByToken(token: string): Promise<DirectoryEntry | undefined> {
    if (!token) return undefined;
    return this.find((user) => user.token !== '' && tokensEqual(user.token, token));
  }

  async findByUsername(username: string): Promise<DirectoryEntry | undefined> {
    if (!username) return undefined;
    return this.find((user) => user.username === username);
  }

  warm(): Promise<void> {
    return Promise.resolve();
  }

  refresh(): Promise<void> {
    return Promise.resolve();
  }

  record(_user: User): void {
    // Nothing to maintain: every lookup reads the corpus.
  }
}
