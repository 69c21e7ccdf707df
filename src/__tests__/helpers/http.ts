/**
 * Fetch Stubs
 * Layer: Test Helpers
 *
 * `stubFetch` returns a jest.fn() that answers each call with the next entry
 * of a script: a Response is returned, an Error is thrown (a transport
 * failure). Running past the end of the script fails the test loudly.
 * `truncatedResponse` is a 200 whose body stream breaks while it is read.
 */
import type { FetchFn } from '@infrastructure/http/RetryingCaller';

export type FetchStep = Response | Error | (() => Response | Error);

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function statusResponse(status: number): Response {
  return new Response(null, { status });
}

export function truncatedResponse(reason = 'terminated'): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new TypeError(reason));
    },
  });
  return new Response(body, { status: 200 });
}

export function stubFetch(...steps: FetchStep[]): jest.MockedFunction<FetchFn> {
  const queue = [...steps];
  return jest.fn(async (_input: string, _init?: RequestInit) => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('stubFetch: no scripted response left');
    }
    const step = typeof next === 'function' ? next() : next;
    if (step instanceof Error) throw step;
    return step;
  });
}
