/**
 * Retrying Caller — Rate-Limited HTTP with Exponential Backoff
 * Layer: Infrastructure (HTTP)
 *
 * Performs one logical outbound call: take a slot from the RateLimiter, then
 * try the request up to `maxRetries + 1` times.
 *
 *   200                           → read and parse the JSON body, done.
 *   429/500/502/503/504           → back off and retry while attempts remain.
 *   transport failure (DNS, reset,
 *   per-attempt timeout, also while
 *   reading a 200 body)           → back off and retry while attempts remain.
 *   anything else / out of tries  → UpstreamError with the last status or cause.
 *
 * Backoff for attempt i is `min(base * multiplier^i, max)`, moved by a
 * symmetric random jitter of at most ±jitterRange of itself, never below 0.
 * The jitter is drawn again for every attempt.
 *
 * Every attempt gets its own timeout signal, combined with the caller's
 * signal. When the caller's signal aborts, remaining attempts and any pending
 * backoff are abandoned.
 *
 * The result is a ResultAsync rather than a rejected promise: upstream failure
 * is an expected outcome and the type says so.
 */
import { audit } from '@core/audit';
import type { IClock } from '@domain/interfaces/IClock';
import { RETRYABLE_STATUS_CODES, SUCCESS_STATUS } from '@shared/constants';
import { UpstreamError } from '@shared/errors/AppError';
import type { RequestContext } from '@shared/types';
import { err, ok, type Result, ResultAsync } from 'neverthrow';

import type { RateLimiter } from './RateLimiter';
import { systemClock } from './systemClock';

export interface RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** Fraction of the computed delay, e.g. 0.1 → ±10%. */
  readonly jitterRange: number;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface RetryingCallerOptions {
  baseUrl: string;
  policy: RetryPolicy;
  limiter: RateLimiter;
  timeoutMs: number;
  fetch?: FetchFn;
  clock?: IClock;
  /** Uniform [0, 1) source for jitter. */
  random?: () => number;
}

export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const delay = Math.min(
    policy.baseDelayMs * policy.backoffMultiplier ** attempt,
    policy.maxDelayMs,
  );
  const jitter = (random() * 2 - 1) * policy.jitterRange * delay;
  return Math.max(0, delay + jitter);
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    const inner = cause.cause instanceof Error ? `: ${cause.cause.message}` : '';
    return `${cause.message}${inner}`;
  }
  return String(cause);
}

/** Only a body that arrived in full but is not JSON ends up here; it is not retried. */
function parseBody(text: string, status: number): Result<unknown, UpstreamError> {
  try {
    const body: unknown = JSON.parse(text);
    return ok(body);
  } catch (cause) {
    return err(new UpstreamError('Upstream API returned an invalid JSON body', { status, cause }));
  }
}

export class RetryingCaller {
  readonly baseUrl: string;
  readonly policy: RetryPolicy;
  private readonly limiter: RateLimiter;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly clock: IClock;
  private readonly random: () => number;

  constructor(options: RetryingCallerOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.policy = options.policy;
    this.limiter = options.limiter;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  call(ctx: RequestContext, path: string, method: HttpMethod = 'GET'): ResultAsync<unknown, UpstreamError> {
    return new ResultAsync(this.run(ctx, `${this.baseUrl}${path}`, method));
  }

  private async run(
    ctx: RequestContext,
    url: string,
    method: HttpMethod,
  ): Promise<Result<unknown, UpstreamError>> {
    try {
      await this.limiter.acquire({ log: ctx.log, signal: ctx.signal });
      return await this.attempt(ctx, url, method);
    } catch (cause) {
      if (ctx.signal?.aborted) {
        return err(new UpstreamError('Upstream request cancelled', { cause }));
      }
      throw cause;
    }
  }

  private async attempt(
    ctx: RequestContext,
    url: string,
    method: HttpMethod,
  ): Promise<Result<unknown, UpstreamError>> {
    const { maxRetries } = this.policy;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (ctx.signal?.aborted) {
        return err(new UpstreamError('Upstream request cancelled'));
      }

      const startedAt = this.clock.now();
      audit(ctx.log, { stage: 'upstream_request', attempt: attempt + 1, method, url });

      let status: number;
      let text: string | undefined;
      try {
        const response = await this.fetchFn(url, {
          method,
          headers: { Accept: 'application/json' },
          signal: this.attemptSignal(ctx.signal),
        });
        status = response.status;
        // The body is read under the same signal, so a reset or timeout mid-body is a transport failure.
        if (status === SUCCESS_STATUS) {
          text = await response.text();
        } else {
          await response.body?.cancel();
        }
      } catch (cause) {
        if (ctx.signal?.aborted) {
          return err(new UpstreamError('Upstream request cancelled', { cause }));
        }
        const reason = describeCause(cause);
        audit(ctx.log, {
          stage: 'request_exception',
          outcome: 'error',
          attempt: attempt + 1,
          error: reason,
        });
        if (attempt < maxRetries) {
          await this.backoff(ctx, attempt);
          continue;
        }
        return err(new UpstreamError(`Upstream API request failed: ${reason}`, { cause }));
      }

      audit(ctx.log, {
        stage: 'upstream_response',
        statusCode: status,
        latencyMs: Math.round((this.clock.now() - startedAt) * 100) / 100,
        url,
      });

      if (text !== undefined) {
        return parseBody(text, status);
      }

      if (RETRYABLE_STATUS_CODES.has(status) && attempt < maxRetries) {
        await this.backoff(ctx, attempt, status);
        continue;
      }

      audit(ctx.log, {
        stage: 'upstream_error',
        outcome: 'error',
        statusCode: status,
        attempts: attempt + 1,
      });
      return err(new UpstreamError(`Upstream API failed with status ${status}`, { status }));
    }

    return err(new UpstreamError('Max retries exceeded'));
  }

  private async backoff(ctx: RequestContext, attempt: number, status?: number): Promise<void> {
    const sleepMs = computeBackoffDelay(this.policy, attempt, this.random);
    audit(ctx.log, {
      stage: 'retry_backoff',
      attempt: attempt + 1,
      ...(status !== undefined && { statusCode: status }),
      sleepMs,
    });
    await this.clock.sleep(sleepMs, ctx.signal);
  }

  private attemptSignal(callerSignal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    return callerSignal ? AbortSignal.any([callerSignal, timeout]) : timeout;
  }
}
