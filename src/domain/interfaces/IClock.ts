/**
 * Clock Interface
 * Layer: Domain
 *
 * The rate limiter and the retrying caller never touch Date.now() or timers
 * directly; they ask a Clock. Production uses the system clock, tests use a
 * synthetic one whose sleeps advance virtual time instantly.
 *
 * `sleep` must reject when `signal` aborts, so a cancelled request stops
 * waiting for a rate-limit slot or a backoff delay.
 */
export interface IClock {
  /** Milliseconds since the epoch (or any fixed origin). */
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
