/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - The service is one process over a local document corpus; its counters live
 *   in memory next to it and reset on restart.
 *
 * RULES:
 * - A window starts at the first hit; later hits do not extend it.
 * - Expired counters are dropped lazily, on the next access.
 * - `now` is injectable so tests move time without timers.
 */

import type { Cache, CounterOptions } from './cache';

type Counter = { count: number; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly counters = new Map<string, Counter>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): Counter | undefined {
    const counter = this.counters.get(key);
    if (counter && counter.expiresAtMs !== null && counter.expiresAtMs <= this.now()) {
      this.counters.delete(key);
      return undefined;
    }
    return counter;
  }

  incr(key: string, opts?: CounterOptions): Promise<number> {
    const current = this.live(key);
    if (current) {
      current.count += 1;
      return Promise.resolve(current.count);
    }

    const expiresAtMs = opts?.ttlSeconds ? this.now() + opts.ttlSeconds * 1000 : null;
    this.counters.set(key, { count: 1, expiresAtMs });
    return Promise.resolve(1);
  }

  del(key: string): Promise<void> {
    this.counters.delete(key);
    return Promise.resolve();
  }

  /** Counters currently held, expired ones included until touched. */
  get size(): number {
    return this.counters.size;
  }
}
