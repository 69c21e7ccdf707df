/**
 * Unit Tests — RetryingCaller & computeBackoffDelay
 *
 * fetch is a scripted stub and time is a FakeClock, so each test states the
 * exact sequence of upstream answers and asserts the exact attempts and
 * sleeps that follow. The limiter gets a generous budget here; its own
 * behaviour is covered in RateLimiter.unit.test.ts.
 */
import { RateLimiter } from '@infrastructure/http/RateLimiter';
import {
  computeBackoffDelay,
  type FetchFn,
  RetryingCaller,
  type RetryPolicy,
} from '@infrastructure/http/RetryingCaller';

import { FakeClock } from '../helpers/FakeClock';
import { jsonResponse, statusResponse, stubFetch, truncatedResponse } from '../helpers/http';
import { createTestContext } from '../helpers/stubProvider';

const policy: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitterRange: 0,
};

function buildCaller(fetch: FetchFn, overrides: Partial<RetryPolicy> = {}, timeoutMs = 5000) {
  const clock = new FakeClock();
  const limiter = new RateLimiter({ maxRequests: 100, windowMs: 60_000, clock });
  const caller = new RetryingCaller({
    baseUrl: 'https://upstream.test/',
    policy: { ...policy, ...overrides },
    limiter,
    timeoutMs,
    fetch,
    clock,
  });
  return { caller, clock, limiter };
}

describe('computeBackoffDelay', () => {
  const jittered: RetryPolicy = { ...policy, jitterRange: 0.1 };

  it('should grow exponentially from the base delay', () => {
    expect([0, 1, 2, 3].map((attempt) => computeBackoffDelay(policy, attempt))).toEqual([
      1000, 2000, 4000, 8000,
    ]);
  });

  it('should cap the delay at maxDelayMs', () => {
    expect(computeBackoffDelay(policy, 10)).toBe(30_000);
  });

  it('should apply symmetric jitter of at most jitterRange', () => {
    expect(computeBackoffDelay(jittered, 2, () => 0)).toBeCloseTo(3600);
    expect(computeBackoffDelay(jittered, 2, () => 0.5)).toBeCloseTo(4000);
    expect(computeBackoffDelay(jittered, 2, () => 1)).toBeCloseTo(4400);
  });

  it('should never return a negative delay', () => {
    expect(computeBackoffDelay({ ...policy, jitterRange: 2 }, 0, () => 0)).toBe(0);
  });
});

describe('RetryingCaller', () => {
  it('should return the parsed body of a 200 on the first attempt', async () => {
    const fetch = stubFetch(jsonResponse([{ leagueId: 1 }]));
    const { caller, clock } = buildCaller(fetch);

    const result = await caller.call(createTestContext(), '/getavailableleagues');

    expect(result._unsafeUnwrap()).toEqual([{ leagueId: 1 }]);
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(
      'https://upstream.test/getavailableleagues',
      expect.objectContaining({ method: 'GET' }),
    );
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry retryable statuses with exponential backoff until a 200', async () => {
    const fetch = stubFetch(
      statusResponse(503),
      statusResponse(503),
      statusResponse(503),
      jsonResponse({ ok: true }),
    );
    const { caller, clock } = buildCaller(fetch);

    const result = await caller.call(createTestContext(), '/getteam/40');

    expect(result._unsafeUnwrap()).toEqual({ ok: true });
    expect(fetch).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
  });

  it('should give up after maxRetries + 1 attempts with the last status', async () => {
    const fetch = stubFetch(
      statusResponse(429),
      statusResponse(500),
      statusResponse(502),
      statusResponse(504),
    );
    const { caller, clock } = buildCaller(fetch);

    const error = (await caller.call(createTestContext(), '/getteam/40'))._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream API failed with status 504');
    expect(error.status).toBe(504);
    expect(fetch).toHaveBeenCalledTimes(4);
    expect(clock.sleeps).toEqual([1000, 2000, 4000]);
  });

  it('should not retry a non-retryable status', async () => {
    const fetch = stubFetch(statusResponse(404));
    const { caller, clock } = buildCaller(fetch);

    const error = (await caller.call(createTestContext(), '/getteam/40'))._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream API failed with status 404');
    expect(error.code).toBe('UPSTREAM_ERROR');
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should retry transport failures and report the cause when they persist', async () => {
    const fetch = stubFetch(new TypeError('fetch failed'), new TypeError('fetch failed'));
    const { caller, clock } = buildCaller(fetch, { maxRetries: 1 });

    const error = (await caller.call(createTestContext(), '/getavailableleagues'))._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream API request failed: fetch failed');
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('should recover when a transport failure is followed by a 200', async () => {
    const fetch = stubFetch(new TypeError('fetch failed'), jsonResponse([]));
    const { caller } = buildCaller(fetch);

    const result = await caller.call(createTestContext(), '/getavailableleagues');

    expect(result._unsafeUnwrap()).toEqual([]);
  });

  it('should retry when a 200 body breaks off while it is being read', async () => {
    const fetch = stubFetch(truncatedResponse(), jsonResponse([{ leagueId: 1 }]));
    const { caller, clock } = buildCaller(fetch);

    const result = await caller.call(createTestContext(), '/getavailableleagues');

    expect(result._unsafeUnwrap()).toEqual([{ leagueId: 1 }]);
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
  });

  it('should report a body that keeps breaking off as a transport failure', async () => {
    const fetch = stubFetch(truncatedResponse(), truncatedResponse());
    const { caller } = buildCaller(fetch, { maxRetries: 1 });

    const error = (await caller.call(createTestContext(), '/getavailableleagues'))._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream API request failed: terminated');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('should time out a hanging attempt and retry it', async () => {
    const reasons: Error[] = [];
    const fetch: jest.MockedFunction<FetchFn> = jest.fn(
      (_input: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error('attempt has no signal'));
            return;
          }
          signal.addEventListener('abort', () => {
            reasons.push(signal.reason);
            reject(signal.reason);
          });
        }),
    );
    const { caller, clock } = buildCaller(fetch, { maxRetries: 1 }, 20);

    const error = (await caller.call(createTestContext(), '/getavailableleagues'))._unsafeUnwrapErr();

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(clock.sleeps).toEqual([1000]);
    expect(reasons.map((reason) => reason.name)).toEqual(['TimeoutError', 'TimeoutError']);
    expect(error.message).toBe(`Upstream API request failed: ${reasons[1].message}`);
  });

  it('should make a single attempt when maxRetries is 0', async () => {
    const fetch = stubFetch(statusResponse(503));
    const { caller, clock } = buildCaller(fetch, { maxRetries: 0 });

    const error = (await caller.call(createTestContext(), '/getavailableleagues'))._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream API failed with status 503');
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should treat an unparseable 200 body as a non-retryable failure', async () => {
    const fetch = stubFetch(new Response('<html>oops</html>', { status: 200 }));
    const { caller } = buildCaller(fetch);

    const error = (await caller.call(createTestContext(), '/getavailableleagues'))._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream API returned an invalid JSON body');
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should not call upstream when the request is already cancelled', async () => {
    const fetch = stubFetch(jsonResponse([]));
    const { caller, limiter } = buildCaller(fetch);
    const controller = new AbortController();
    controller.abort();

    const error = (
      await caller.call(createTestContext({ signal: controller.signal }), '/getavailableleagues')
    )._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream request cancelled');
    expect(fetch).not.toHaveBeenCalled();
    expect(limiter.activeCount()).toBe(0);
  });

  it('should abandon the backoff when the request is cancelled mid-retry', async () => {
    const controller = new AbortController();
    const fetch = stubFetch(() => {
      controller.abort();
      return statusResponse(503);
    });
    const { caller, clock } = buildCaller(fetch);

    const error = (
      await caller.call(createTestContext({ signal: controller.signal }), '/getavailableleagues')
    )._unsafeUnwrapErr();

    expect(error.message).toBe('Upstream request cancelled');
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('should take one rate-limit slot per logical call, not per attempt', async () => {
    const fetch = stubFetch(statusResponse(503), jsonResponse([]));
    const { caller, limiter } = buildCaller(fetch);

    await caller.call(createTestContext(), '/getavailableleagues');

    expect(limiter.activeCount()).toBe(1);
  });
});
