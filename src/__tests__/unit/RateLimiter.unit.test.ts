/**
 * Unit Tests — RateLimiter
 *
 * All timing runs on the FakeClock, so "waiting a second" costs nothing and
 * every acquisition time is exact. The limiter records `now` when it grants
 * a slot, which is what these tests read back.
 */
import { RateLimiter } from '@infrastructure/http/RateLimiter';

import { FakeClock } from '../helpers/FakeClock';

describe('RateLimiter', () => {
  let clock: FakeClock;

  beforeEach(() => {
    clock = new FakeClock();
  });

  it('should reject a non-positive request budget or window', () => {
    expect(() => new RateLimiter({ maxRequests: 0, windowMs: 1000, clock })).toThrow(RangeError);
    expect(() => new RateLimiter({ maxRequests: 1.5, windowMs: 1000, clock })).toThrow(RangeError);
    expect(() => new RateLimiter({ maxRequests: 1, windowMs: 0, clock })).toThrow(RangeError);
  });

  it('should grant up to maxRequests immediately', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock });

    await limiter.acquire();
    await limiter.acquire();

    expect(clock.now()).toBe(0);
    expect(clock.sleeps).toEqual([]);
    expect(limiter.activeCount()).toBe(2);
  });

  it('should hold the third acquisition until the oldest slot expires plus the margin', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock });
    const grantedAt: number[] = [];

    for (let i = 0; i < 3; i++) {
      await limiter.acquire();
      grantedAt.push(clock.now());
    }

    expect(grantedAt).toEqual([0, 0, 1100]);
    expect(clock.sleeps).toEqual([1100]);
  });

  it('should serve concurrent callers without over-granting', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock });

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    // Two callers got a slot at t=0; only the third had to wait.
    expect(clock.sleeps).toEqual([1100]);
    expect(clock.now()).toBe(1100);
    expect(limiter.activeCount()).toBe(1);
  });

  it('should only wait for the remainder of the window', async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, clock, marginMs: 0 });

    await limiter.acquire();
    clock.advance(600);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([400]);
    expect(clock.now()).toBe(1000);
  });

  it('should never grant more than maxRequests inside any trailing window', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock });
    const grantedAt: number[] = [];

    // Park–Miller generator: irregular arrivals, same sequence every run.
    let seed = 7;
    const nextGap = (): number => {
      seed = (seed * 16807) % 2147483647;
      return seed % 700;
    };

    for (let i = 0; i < 40; i++) {
      clock.advance(nextGap());
      await limiter.acquire();
      grantedAt.push(clock.now());
    }

    for (const t of grantedAt) {
      const inWindow = grantedAt.filter((other) => other <= t && t - other < 1000);
      expect(inWindow.length).toBeLessThanOrEqual(2);
    }
  });

  it('should stop waiting when the signal aborts', async () => {
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, clock });
    const controller = new AbortController();

    await limiter.acquire();
    controller.abort();

    await expect(limiter.acquire({ signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
    expect(limiter.activeCount()).toBe(1);
  });

  it('should not take a free slot for a caller that is already cancelled', async () => {
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, clock });
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire({ signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
    expect(limiter.activeCount()).toBe(0);
    expect(clock.sleeps).toEqual([]);
  });
});
