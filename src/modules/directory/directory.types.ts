/**
 * src/modules/directory/directory.types.ts
 *
 * WHY:
 * - Secondary lookup of accounts (by bearer token, by username) behind one contract,
 *   so the scan and the in-memory index are interchangeable in DI and tests.
 *
 * RULES:
 * - "Not found" is `undefined`, never an error.
 * - An empty token/username never matches.
 */

import type { User, UserRole } from '../users/user.types';

export type DirectoryEntry = {
  role: UserRole;
  user: User;
};

export interface DirectoryIndex {
  findByToken(token: string): Promise<DirectoryEntry | undefined>;
  findByUsername(username: string): Promise<DirectoryEntry | undefined>;

  /** Prepares the index before the first request (no-op for the scan). */
  warm(): Promise<void>;

  /** Rebuilds from the corpus, picking up accounts written by other processes. */
  refresh(): Promise<void>;

  /** Told about every account write that may change token/username visibility. */
  record(user: User): void;
}
