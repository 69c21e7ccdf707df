/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * I funnel every setting (port, log level, upstream URL, rate-limit window,
 * retry policy) through this file so there's one place to look and one place
 * to validate. Every other module imports `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "60" → 60, "1.5" → 1.5) at startup. If anything is missing or invalid,
 * the app exits immediately with a clear error.
 *
 * Delays come in as seconds (RATE_LIMIT_WINDOW, BASE_DELAY, MAX_DELAY) and are
 * converted to milliseconds here, so the rest of the code only deals in ms.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  PORT: z.coerce.number().int().default(8000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Which upstream adapter the container builds. Only one provider is active at a time. */
  PROVIDER_NAME: z.string().min(1).default('openliga'),
  UPSTREAM_BASE_URL: z.url().default('https://api.openligadb.de'),
  /** Hard ceiling for a single outbound attempt; the upstream must not hang a request. */
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  RATE_LIMIT_REQUESTS: z.coerce.number().int().min(1).default(10),
  /** Rolling window in seconds. */
  RATE_LIMIT_WINDOW: z.coerce.number().positive().default(60),

  MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  BASE_DELAY: z.coerce.number().min(0).default(1.0),
  MAX_DELAY: z.coerce.number().min(0).default(30.0),
  BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2.0),
  /** Fraction of the computed delay used as symmetric jitter (0.1 → ±10%). */
  JITTER_RANGE: z.coerce.number().min(0).max(1).default(0.1),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  provider: {
    name: env.PROVIDER_NAME,
    baseUrl: env.UPSTREAM_BASE_URL,
    timeoutMs: env.UPSTREAM_TIMEOUT_MS,

    rateLimit: {
      maxRequests: env.RATE_LIMIT_REQUESTS,
      windowMs: env.RATE_LIMIT_WINDOW * 1000,
    },

    retry: {
      maxRetries: env.MAX_RETRIES,
      baseDelayMs: env.BASE_DELAY * 1000,
      maxDelayMs: env.MAX_DELAY * 1000,
      backoffMultiplier: env.BACKOFF_MULTIPLIER,
      jitterRange: env.JITTER_RANGE,
    },
  },
} as const;

export type AppConfig = typeof config;
export type ProviderConfig = AppConfig['provider'];
