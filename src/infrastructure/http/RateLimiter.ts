/**
 * Sliding-Window Rate Limiter
 * Layer: Infrastructure (HTTP)
 *
 * Bounds outbound calls to `maxRequests` per rolling `windowMs`. State is just
 * the timestamps of recent acquisitions, oldest first.
 *
 * acquire():
 *   0. A caller that is already cancelled is rejected without taking a slot.
 *   1. Drop timestamps that are at least `windowMs` old.
 *   2. If fewer than `maxRequests` remain, record `now` and return.
 *   3. Otherwise sleep until the oldest slot expires (plus a small margin) and
 *      start again from step 1. The check is re-run because other callers may
 *      have taken the freed slot while we slept.
 *
 * Steps 1–2 run synchronously with no await in between, so on Node's single
 * thread they form the critical section: two concurrent acquire() calls can
 * never both see the same free slot. There is no FIFO fairness — a newcomer
 * may take a slot before an earlier waiter wakes up — and no upper bound on
 * the wait.
 *
 * One instance is owned by each provider adapter and lives as long as the
 * process; nothing is persisted.
 */
import { audit } from '@core/audit';
import type { Logger } from '@core/logger';
import type { IClock } from '@domain/interfaces/IClock';
import { RATE_LIMIT_MARGIN_MS } from '@shared/constants';

import { systemClock } from './systemClock';

export interface RateLimiterOptions {
  maxRequests: number;
  windowMs: number;
  clock?: IClock;
  marginMs?: number;
}

export interface AcquireContext {
  log?: Logger;
  signal?: AbortSignal;
}

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly clock: IClock;
  private readonly marginMs: number;
  private timestamps: number[] = [];

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxRequests) || options.maxRequests < 1) {
      throw new RangeError(`maxRequests must be a positive integer, got ${options.maxRequests}`);
    }
    if (!(options.windowMs > 0)) {
      throw new RangeError(`windowMs must be positive, got ${options.windowMs}`);
    }
    this.maxRequests = options.maxRequests;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? systemClock;
    this.marginMs = options.marginMs ?? RATE_LIMIT_MARGIN_MS;
  }

  async acquire(ctx: AcquireContext = {}): Promise<void> {
    ctx.signal?.throwIfAborted();
    for (;;) {
      const now = this.clock.now();
      this.prune(now);

      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }

      const waitMs = this.windowMs - (now - this.timestamps[0]) + this.marginMs;
      if (ctx.log) {
        audit(ctx.log, { stage: 'rate_limit', outcome: 'waiting', sleepMs: waitMs });
      }
      await this.clock.sleep(waitMs, ctx.signal);
    }
  }

  /** Acquisitions still inside the window as of `now`. */
  activeCount(now = this.clock.now()): number {
    this.prune(now);
    return this.timestamps.length;
  }

  private prune(now: number): void {
    this.timestamps = this.timestamps.filter((at) => now - at < this.windowMs);
  }
}
