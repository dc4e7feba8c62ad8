/**
 * src/shared/store/json-file-store.ts
 *
 * WHY:
 * - Production DocumentStore: one UTF-8 JSON file per document under a root directory.
 *
 * WRITES:
 * - save() writes a temporary sibling file and renames it over the target.
 *   rename() is atomic on one filesystem, so a concurrent read sees the old or the
 *   new document, never a half-written one.
 * - update() holds the per-path lock for the whole read -> mutate -> save.
 *   Lock keys are normalized paths ('a//b' and 'a/b' share one lock).
 * - update() on a malformed document throws StorageError('update') and leaves the
 *   file untouched. Only a missing document starts from {}.
 *
 * READS:
 * - Missing file -> { status: 'missing' }.
 * - Unparsable file, non-object JSON, or any other read error -> { status: 'malformed' }.
 *   load() turns both into {} (logged for malformed).
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

import type { Logger } from '../logger/logger';
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

const DOCUMENT_EXTENSION = '.json';

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class JsonFileStore implements DocumentStore {
  private readonly root: string;
  private readonly lock = new PathLock();

  constructor(
    rootDir: string,
    private readonly logger?: Logger,
  ) {
    this.root = path.resolve(rootDir);
  }

  get rootDir(): string {
    return this.root;
  }

  private toAbsolute(docPath: string): string {
    const resolved = path.resolve(this.root, docPath);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new Error(`JsonFileStore: path escapes the store root: ${docPath}`);
    }
    return resolved;
  }

  private toRelative(absolute: string): string {
    return path.relative(this.root, absolute).split(path.sep).join('/');
  }

  async read(docPath: string): Promise<ReadResult> {
    const file = this.toAbsolute(docPath);

    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf8');
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        return { status: 'missing' };
      }
      return {
        status: 'malformed',
        reason: `read failed: ${err instanceof Error ? err.message : String(err)}`,
      };
    }

    return parseDocument(raw);
  }

  async load(docPath: string): Promise<JsonObject> {
    const result = await this.read(docPath);

    if (result.status === 'ok') return result.document;

    if (result.status === 'malformed') {
      this.logger?.warn({
        msg: 'store.document_malformed',
        flow: 'store.load',
        path: docPath,
        reason: result.reason,
      });
    }

    return {};
  }

  async save(docPath: string, document: JsonObject): Promise<void> {
    const file = this.toAbsolute(docPath);
    const tmp = `${file}.${randomUUID()}.tmp`;

    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmp, serializeDocument(document), { encoding: 'utf8' });
      await fs.rename(tmp, file);
    } catch (err: unknown) {
      await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        this.logger?.debug({
          msg: 'store.tmp_cleanup_failed',
          flow: 'store.save',
          path: docPath,
          message: cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr),
        });
      });

      this.logger?.error({
        msg: 'store.save_failed',
        flow: 'store.save',
        path: docPath,
        message: err instanceof Error ? err.message : String(err),
      });
      throw new StorageError('save', docPath, err);
    }
  }

  async update<R>(docPath: string, mutate: DocumentMutator<R>): Promise<R> {
    return this.lock.runExclusive(joinDocumentPath(docPath), async () => {
      const result = await this.read(docPath);

      if (result.status === 'malformed') {
        this.logger?.error({
          msg: 'store.update_refused',
          flow: 'store.update',
          path: docPath,
          reason: result.reason,
        });
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

  async list(dir: string): Promise<string[]> {
    const start = this.toAbsolute(dir);
    const found: string[] = [];

    const walk = async (current: string): Promise<void> => {
      const entries = await fs.readdir(current, { withFileTypes: true });

      for (const entry of entries) {
        const absolute = path.join(current, entry.name);
        if (entry.isDirectory()) {
          await walk(absolute);
        } else if (entry.isFile() && entry.name.endsWith(DOCUMENT_EXTENSION)) {
          found.push(this.toRelative(absolute));
        }
      }
    };

    try {
      await fs.access(start);
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === 'ENOENT') return [];
      throw new StorageError('list', dir, err);
    }

    try {
      await walk(start);
    } catch (err: unknown) {
      throw new StorageError('list', dir, err);
    }

    return found;
  }
}
