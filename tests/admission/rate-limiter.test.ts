/**
 * Unit Tests for RateLimiter
 */

import { describe, it, expect, vi } from 'vitest';
import { RateLimiter, RATE_WINDOW_SECONDS } from '../../lib/src/admission/index.js';
import { MemoryStore } from '../../lib/src/store/index.js';
import {
  DependencyUnavailableError,
  RateLimitedError,
} from '../../lib/src/errors/index.js';

// 20 seconds into a minute window
const T0 = 1_700_000_060_000;

describe('RateLimiter', () => {
  it('should report remaining requests and seconds to reset', async () => {
    const limiter = new RateLimiter(new MemoryStore(), {}, { now: () => T0 });

    const result = await limiter.hit('chat', '203.0.113.7', 20);

    expect(result).toEqual({ count: 1, limit: 20, remaining: 19, resetSeconds: 40 });
  });

  it('should reject the request after the limit with the reset delay', async () => {
    const limiter = new RateLimiter(new MemoryStore(), {}, { now: () => T0 });

    await limiter.hit('chat', 'c1', 2);
    await limiter.hit('chat', 'c1', 2);
    const error = await limiter.hit('chat', 'c1', 2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterSeconds).toBe(40);
    expect(error instanceof RateLimitedError && error.status).toBe(429);
  });

  it('should open a new window after a minute', async () => {
    let now = T0;
    const limiter = new RateLimiter(new MemoryStore({ now: () => now }), {}, { now: () => now });

    await limiter.hit('chat', 'c1', 1);
    now += RATE_WINDOW_SECONDS * 1000;

    await expect(limiter.hit('chat', 'c1', 1)).resolves.toMatchObject({ count: 1 });
  });

  it('should keep buckets and clients apart', async () => {
    const limiter = new RateLimiter(new MemoryStore(), {}, { now: () => T0 });

    await limiter.hit('chat', 'c1', 1);

    await expect(limiter.hit('default', 'c1', 1)).resolves.toMatchObject({ count: 1 });
    await expect(limiter.hit('chat', 'c2', 1)).resolves.toMatchObject({ count: 1 });
  });

  it('should count under rate:<bucket>:<client>:<window> by default', async () => {
    const store = new MemoryStore({ now: () => T0 });
    const limiter = new RateLimiter(store, {}, { now: () => T0 });

    await limiter.hit('chat', '203.0.113.7', 5);

    expect(await store.getCount(`rate:chat:203.0.113.7:${Math.floor(T0 / 60_000)}`)).toBe(1);
  });

  it('should expire the window key after one window', async () => {
    const store = new MemoryStore({ now: () => T0 });
    const limiter = new RateLimiter(store, { keyPrefix: 'rl' }, { now: () => T0 });

    await limiter.hit('chat', 'c1', 5);

    expect(store.ttl(`rl:chat:c1:${Math.floor(T0 / 60_000)}`)).toBe(60);
  });

  it('should fail closed when the store is down', async () => {
    const limiter = new RateLimiter({
      incr: vi.fn().mockRejectedValue(new Error('ECONNREFUSED')),
      getCount: vi.fn(),
    });

    await expect(limiter.hit('chat', 'c1', 20)).rejects.toThrow(DependencyUnavailableError);
  });
});
