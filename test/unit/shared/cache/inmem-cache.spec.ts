import { describe, it, expect } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';

describe('InMemCache', () => {
  it('incr counts from 1 per key', async () => {
    const cache = new InMemCache();

    expect(await cache.incr('a')).toBe(1);
    expect(await cache.incr('a')).toBe(2);
    expect(await cache.incr('b')).toBe(1);
  });

  it('the window starts at the first hit and is not extended', async () => {
    let nowMs = 0;
    const cache = new InMemCache(() => nowMs);

    expect(await cache.incr('n', { ttlSeconds: 10 })).toBe(1);
    nowMs = 9_999;
    expect(await cache.incr('n', { ttlSeconds: 10 })).toBe(2);
    nowMs = 10_000;
    expect(await cache.incr('n', { ttlSeconds: 10 })).toBe(1);
  });

  it('counters without a ttl never expire', async () => {
    let nowMs = 0;
    const cache = new InMemCache(() => nowMs);

    await cache.incr('n');
    nowMs = Number.MAX_SAFE_INTEGER;
    expect(await cache.incr('n')).toBe(2);
  });

  it('del starts over', async () => {
    const cache = new InMemCache();
    await cache.incr('n');
    await cache.incr('n');

    await cache.del('n');
    expect(cache.size).toBe(0);
    expect(await cache.incr('n')).toBe(1);
  });
});
