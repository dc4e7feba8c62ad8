/**
 * src/shared/cache/cache.ts
 *
 * Expiring counters for short-lived security state (login attempts).
 * The composition root picks the backend; today that is InMemCache.
 */

export type CounterOptions = {
  /** Lifetime of the counter, counted from its first increment. */
  ttlSeconds?: number;
};

export interface Cache {
  /** Increments the counter (creating it at 1) and returns the new value. */
  incr(key: string, opts?: CounterOptions): Promise<number>;

  /** Drops the counter; the next incr() starts a fresh window. */
  del(key: string): Promise<void>;
}
