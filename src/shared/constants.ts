/** Statuses worth another attempt: throttling and transient server-side failures. */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** The only status the upstream uses for a usable body. */
export const SUCCESS_STATUS = 200;

/** Slack added to a rate-limiter wait so the oldest slot has really expired on re-check. */
export const RATE_LIMIT_MARGIN_MS = 100;

export const MATCH_STATUSES = ['scheduled', 'in_progress', 'finished'] as const;

export type MatchStatus = (typeof MATCH_STATUSES)[number];

export const PROXY_EXECUTE_PATH = '/api/v1/proxy/execute';
