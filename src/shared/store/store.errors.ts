/**
 * src/shared/store/store.errors.ts
 *
 * WHY:
 * - Write/list failures must reach the caller (never swallowed).
 * - update() on a malformed document fails instead of rewriting it from {}.
 * - Kept apart from AppError so the store stays HTTP-agnostic, the same way
 *   RateLimitError is; error-handler.ts maps it to 500 STORAGE_FAILURE.
 */

export type StorageOperation = 'save' | 'update' | 'list';

export class StorageError extends Error {
  constructor(
    public readonly operation: StorageOperation,
    public readonly documentPath: string,
    public readonly cause?: unknown,
  ) {
    super(`Storage ${operation} failed for ${documentPath}`);
    this.name = 'StorageError';
  }
}
