import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateLimiter } from '../../src/main/services/rate-limiter';

beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(new Date('2025-06-15T12:00:00Z'));
});

afterEach(() => {
  vi.useRealTimers();
});

describe('RateLimiter', () => {
  it('grants the first request immediately', async () => {
    const limiter = new RateLimiter(1000);
    const start = Date.now();
    await limiter.wait();
    expect(Date.now() - start).toBe(0);
  });

  it('spaces concurrent waiters at least one interval apart', async () => {
    const limiter = new RateLimiter(1000);
    const start = Date.now();
    const grants: number[] = [];
    const all = Promise.all(
      [0, 1, 2].map(() =>
        limiter.wait().then(() => {
          grants.push(Date.now() - start);
        }),
      ),
    );
    await vi.advanceTimersByTimeAsync(2000);
    await all;
    expect(grants).toEqual([0, 1000, 2000]);
  });

  it('does not sleep when the interval already passed', async () => {
    const limiter = new RateLimiter(1000);
    await limiter.wait();
    vi.advanceTimersByTime(1500);
    const before = Date.now();
    await limiter.wait();
    expect(Date.now()).toBe(before);
  });

  it('never sleeps with a zero interval', async () => {
    const limiter = new RateLimiter(0);
    const start = Date.now();
    await limiter.wait();
    await limiter.wait();
    await limiter.wait();
    expect(Date.now()).toBe(start);
  });
});
