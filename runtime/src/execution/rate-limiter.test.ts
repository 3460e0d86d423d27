import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_MAX_CALLS_PER_SECOND, RateLimiter } from './rate-limiter.js';

function fakeClock() {
  const clock = { now: 0 };
  const sleep = vi.fn(async (ms: number) => {
    clock.now += ms;
  });
  return { clock, sleep };
}

describe('RateLimiter', () => {
  it('admits calls up to the limit without waiting', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new RateLimiter({ maxCallsPerSecond: 2, now: () => clock.now, sleep });

    expect(await limiter.acquire()).toBe(0);
    clock.now = 100;
    expect(await limiter.acquire()).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
    expect(limiter.recentCalls).toBe(2);
  });

  it('waits until the oldest call leaves the window', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new RateLimiter({ maxCallsPerSecond: 2, now: () => clock.now, sleep });

    await limiter.acquire();
    clock.now = 100;
    await limiter.acquire();
    clock.now = 300;

    expect(await limiter.acquire()).toBe(700);
    expect(sleep).toHaveBeenCalledWith(700);
    expect(clock.now).toBe(1000);
    // The call at 0 has expired; 100 and 1000 remain.
    expect(limiter.recentCalls).toBe(2);
  });

  it('serializes concurrent callers', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new RateLimiter({ maxCallsPerSecond: 1, now: () => clock.now, sleep });

    const waits = await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(waits).toEqual([0, 1000, 1000]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(clock.now).toBe(2000);
  });

  it('forgets calls older than the window', async () => {
    const { clock, sleep } = fakeClock();
    const limiter = new RateLimiter({ maxCallsPerSecond: 1, now: () => clock.now, sleep });

    await limiter.acquire();
    clock.now = 1000;

    expect(await limiter.acquire()).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('keeps serving callers after a failed wait', async () => {
    const { clock } = fakeClock();
    let attempts = 0;
    const sleep = async (ms: number) => {
      attempts += 1;
      if (attempts === 1) throw new Error('interrupted');
      clock.now += ms;
    };
    const limiter = new RateLimiter({ maxCallsPerSecond: 1, now: () => clock.now, sleep });

    await limiter.acquire();
    await expect(limiter.acquire()).rejects.toThrow('interrupted');
    expect(await limiter.acquire()).toBe(1000);
  });

  it('clamps the limit to at least one call', () => {
    expect(new RateLimiter({ maxCallsPerSecond: 0 }).maxCallsPerSecond).toBe(1);
    expect(new RateLimiter().maxCallsPerSecond).toBe(DEFAULT_MAX_CALLS_PER_SECOND);
  });
});
