/**
 * src/shared/store/document-store.ts
 *
 * WHY:
 * - Every entity (account, collection) is one JSON document at a deterministic path.
 * - Modules depend on this abstraction so tests can use the in-memory implementation.
 *
 * CONTRACT:
 * - read(path)   -> tagged result: ok | missing | malformed (never throws on bad content).
 * - load(path)   -> the document, or {} when missing/malformed (read failures degrade).
 * - save(path)   -> full-document overwrite; creates parents; throws StorageError.
 * - update(path) -> read -> mutate -> save under a per-path lock. The mutator decides
 *                   whether anything is written (`write: false` leaves the file alone).
 *                   A missing document starts as {}; a malformed one throws StorageError.
 * - list(dir)    -> every document path below dir, order unspecified.
 *
 * RULES:
 * - There is no partial-field primitive. Field updates are whole-document rewrites.
 * - Paths are store-relative, '/'-separated (e.g. "Volunteer/alice/user_data.json").
 * - No cross-path atomicity: two update() calls on two paths are independent.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue | undefined };

export type ReadResult =
  | { status: 'ok'; document: JsonObject }
  | { status: 'missing' }
  | { status: 'malformed'; reason: string };

export type UpdateOutcome<R> = {
  write: boolean;
  value: R;
};

export type DocumentMutator<R> = (document: JsonObject) => UpdateOutcome<R>;

export interface DocumentStore {
  read(path: string): Promise<ReadResult>;
  load(path: string): Promise<JsonObject>;
  save(path: string, document: JsonObject): Promise<void>;
  update<R>(path: string, mutate: DocumentMutator<R>): Promise<R>;
  list(dir: string): Promise<string[]>;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pretty-printed (4 spaces), non-ASCII kept as-is (JSON.stringify never escapes it). */
export function serializeDocument(document: JsonObject): string {
  return `${JSON.stringify(document, null, 4)}\n`;
}

export function parseDocument(raw: string): ReadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    return { status: 'malformed', reason: err instanceof Error ? err.message : 'invalid JSON' };
  }

  if (!isJsonObject(parsed)) {
    return { status: 'malformed', reason: 'document is not a JSON object' };
  }

  return { status: 'ok', document: parsed };
}

/** Joins store-relative segments with '/', dropping empty ones. */
export function joinDocumentPath(...segments: string[]): string {
  return segments
    .flatMap((s) => s.split('/'))
    .filter((s) => s.length > 0)
    .join('/');
}
