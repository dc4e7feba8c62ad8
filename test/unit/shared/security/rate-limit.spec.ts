import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';
import { RateLimiter, RateLimitError } from '../../../../src/shared/security/rate-limit';

describe('RateLimiter', () => {
  it('allows up to the limit, then throws RateLimitError', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const hit = () => limiter.hitOrThrow({ key: 'login:user:alice', limit: 2, windowSeconds: 60 });

    await hit();
    await hit();

    const err = await hit().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitError);
    if (err instanceof RateLimitError) {
      expect(err.key).toBe('rl:login:user:alice');
      expect(err.limit).toBe(2);
      expect(err.windowSeconds).toBe(60);
    }
  });

  it('counts keys independently', async () => {
    const limiter = new RateLimiter(new InMemCache());

    await limiter.hitOrThrow({ key: 'a', limit: 1, windowSeconds: 60 });
    await expect(limiter.hitOrThrow({ key: 'b', limit: 1, windowSeconds: 60 })).resolves.toBeUndefined();
  });

  it('resets once the window has passed', async () => {
    let nowMs = 1_000_000;
    const limiter = new RateLimiter(new InMemCache(() => nowMs));
    const hit = () => limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 10 });

    await hit();
    await expect(hit()).rejects.toBeInstanceOf(RateLimitError);

    nowMs += 10_000;
    await expect(hit()).resolves.toBeUndefined();
  });

  it('reset() clears the count for one key', async () => {
    const limiter = new RateLimiter(new InMemCache(), { prefix: 'rl' });
    const hit = () => limiter.hitOrThrow({ key: 'login:user:alice', limit: 1, windowSeconds: 60 });

    await hit();
    await limiter.reset('login:user:alice');
    await expect(hit()).resolves.toBeUndefined();
  });

  it('does nothing when disabled', async () => {
    const limiter = new RateLimiter(new InMemCache(), { disabled: true });
    for (let i = 0; i < 5; i++) {
      await limiter.hitOrThrow({ key: 'k', limit: 1, windowSeconds: 60 });
    }
  });
});
