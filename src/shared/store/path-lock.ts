/**
 * src/shared/store/path-lock.ts
 *
 * WHY:
 * - load -> mutate -> save on the same path must not interleave inside one process,
 *   otherwise the slower writer silently drops the faster one's change.
 * - A promise chain per key gives a single writer per path without any external infra.
 *
 * RULES:
 * - Lock scope is one process. Separate processes still race (last rename wins).
 * - A failing task does not poison the chain: the next task still runs.
 * - Idle keys are removed so the map does not grow with the corpus.
 */

export class PathLock {
  private readonly tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with queued or running work. */
  get size(): number {
    return this.tails.size;
  }
}
