/**
 * src/modules/directory/memory-directory-index.ts
 *
 * WHY:
 * - Replaces the per-request corpus scan with token -> path and username -> path maps.
 * - Built once from a scan (lazily, on first lookup), then maintained incrementally:
 *   UserAccount reports every create / token rotation through record().
 *
 * CONSISTENCY:
 * - A hit is re-read from the store and checked against the requested value.
 *   A stale hit (document gone, token rotated elsewhere) is dropped and reported
 *   as not found.
 * - After warm-up a miss is authoritative. Accounts written by another process are
 *   picked up by refresh(), not by per-lookup scans.
 *
 * RULES:
 * - One warm-up at a time; a failed warm-up is retried on the next lookup.
 * - Accounts recorded while the warm-up scan runs win over what the scan read.
 */

import type { DocumentStore } from '../../shared/store/document-store';
import type { Logger } from '../../shared/logger/logger';
import { tokensEqual } from '../../shared/security/token';
import { parseUserDocument } from '../users/dal/user.document';
import { parseUserDocumentPath, userDocumentPath } from '../users/user.paths';
import type { User } from '../users/user.types';
import type { DirectoryEntry, DirectoryIndex } from './directory.types';
import type { ScanDirectoryIndex } from './scan-directory-index';

export class MemoryDirectoryIndex implements DirectoryIndex {
  private readonly byToken = new Map<string, string>();
  private readonly byUsername = new Map<string, string>();
  private readonly tokenOfPath = new Map<string, string>();

  private warming: Promise<void> | null = null;
  // Paths recorded while a warm-up scan is running; the scan must not overwrite them.
  private recordedDuringWarm: Set<string> | null = null;

  constructor(
    private readonly deps: {
      store: DocumentStore;
      scan: ScanDirectoryIndex;
      logger: Logger;
    },
  ) {}

  private index(path: string, user: User): void {
    const previous = this.tokenOfPath.get(path);
    if (previous !== undefined && previous !== user.token) {
      this.byToken.delete(previous);
    }

    if (user.token) {
      this.byToken.set(user.token, path);
    }
    this.tokenOfPath.set(path, user.token);
    this.byUsername.set(user.username, path);
  }

  private forgetPath(path: string): void {
    const token = this.tokenOfPath.get(path);
    if (token !== undefined) this.byToken.delete(token);
    this.tokenOfPath.delete(path);

    for (const [username, indexed] of this.byUsername) {
      if (indexed === path) this.byUsername.delete(username);
    }
  }

  private ensureWarm(): Promise<void> {
    if (!this.warming) {
      this.warming = this.warmUp().catch((err: unknown) => {
        this.warming = null;
        throw err;
      });
    }
    return this.warming;
  }

  private async warmUp(): Promise<void> {
    const started = Date.now();
    let count = 0;

    const recorded = new Set<string>();
    this.recordedDuringWarm = recorded;
    try {
      for await (const entry of this.deps.scan.entries()) {
        if (!recorded.has(entry.path)) this.index(entry.path, entry.user);
        count++;
      }
    } finally {
      this.recordedDuringWarm = null;
    }

    this.deps.logger.info({
      msg: 'directory.index_warmed',
      flow: 'directory.warm',
      accounts: count,
      durationMs: Date.now() - started,
    });
  }

  async warm(): Promise<void> {
    await this.ensureWarm();
  }

  /** Drops everything and rebuilds from a fresh scan. */
  async refresh(): Promise<void> {
    this.byToken.clear();
    this.byUsername.clear();
    this.tokenOfPath.clear();
    this.warming = null;
    await this.ensureWarm();
  }

  get size(): number {
    return this.byUsername.size;
  }

  private async resolve(
    path: string,
    matches: (user: User) => boolean,
  ): Promise<DirectoryEntry | undefined> {
    const location = parseUserDocumentPath(path);
    const result = await this.deps.store.read(path);
    const user = result.status === 'ok' ? parseUserDocument(result.document) : undefined;

    if (!location || !user) {
      this.forgetPath(path);
      return undefined;
    }

    // Keep the maps in line with what is actually on disk.
    this.index(path, user);
    return matches(user) ? { role: location.role, user } : undefined;
  }

  async findByToken(token: string): Promise<DirectoryEntry | undefined> {
    if (!token) return undefined;
    await this.ensureWarm();

    const path = this.byToken.get(token);
    if (!path) return undefined;

    const entry = await this.resolve(path, (user) => tokensEqual(user.token, token));
    if (!entry) {
      this.deps.logger.debug({ msg: 'directory.stale_token_entry', flow: 'directory.lookup' });
      this.byToken.delete(token);
    }
    return entry;
  }

  async findByUsername(username: string): Promise<DirectoryEntry | undefined> {
    if (!username) return undefined;
    await this.ensureWarm();

    const path = this.byUsername.get(username);
    if (!path) return undefined;

    return this.resolve(path, (user) => user.username === username);
  }

  record(user: User): void {
    const path = userDocumentPath(user.role, user.username);
    this.index(path, user);
    this.recordedDuringWarm?.add(path);
  }
}
