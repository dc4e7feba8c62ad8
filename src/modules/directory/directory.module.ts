/**
 * src/modules/directory/directory.module.ts
 *
 * WHY:
 * - Encapsulates Directory module wiring.
 * - The composition root picks the implementation (config DIRECTORY_INDEX).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { DocumentStore } from '../../shared/store/document-store';
import type { Logger } from '../../shared/logger/logger';
import type { DirectoryIndexMode } from '../../app/config';
import type { DirectoryIndex } from './directory.types';
import { ScanDirectoryIndex } from './scan-directory-index';
import { MemoryDirectoryIndex } from './memory-directory-index';

export type DirectoryModule = ReturnType<typeof createDirectoryModule>;

export function createDirectoryModule(deps: {
  store: DocumentStore;
  logger: Logger;
  mode: DirectoryIndexMode;
}) {
  const scan = new ScanDirectoryIndex(deps.store, deps.logger);

  const directory: DirectoryIndex =
    deps.mode === 'memory'
      ? new MemoryDirectoryIndex({ store: deps.store, scan, logger: deps.logger })
      : scan;

  return { directory };
}
