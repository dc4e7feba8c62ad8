/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Caps password guessing: at most `limit` login attempts per username per window
 *   (LOGIN_RATE_LIMIT / LOGIN_RATE_WINDOW_SECONDS). A successful login clears the count.
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'login:user:alice', limit: 10, windowSeconds: 900 })
 * - await limiter.reset('login:user:alice')
 *
 * RULES:
 * - Count first, then compare: two concurrent attempts both count.
 * - `disabled` is decided by the composition root (di.ts), never from NODE_ENV here.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitHit = {
  key: string;
  limit: number;
  windowSeconds: number;
};

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts: { prefix?: string; disabled?: boolean } = {},
  ) {}

  private keyOf(key: string): string {
    return this.opts.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  async hitOrThrow(hit: RateLimitHit): Promise<void> {
    if (this.opts.disabled) return;

    const key = this.keyOf(hit.key);
    const attempts = await this.cache.incr(key, { ttlSeconds: hit.windowSeconds });
    if (attempts > hit.limit) {
      throw new RateLimitError(key, hit.limit, hit.windowSeconds);
    }
  }

  async reset(key: string): Promise<void> {
    if (this.opts.disabled) return;
    await this.cache.del(this.keyOf(key));
  }
}
