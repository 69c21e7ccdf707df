/**
 * Provider Factory
 * Layer: Infrastructure (Providers)
 * Pattern: Factory Function
 *
 * Builds the one active provider from configuration. The provider owns its
 * RateLimiter and RetryingCaller — they are created here, once, and are not
 * module-level singletons, so two providers (e.g. in two tests) never share
 * rate-limit state.
 *
 * `overrides` lets tests inject a stub fetch, a synthetic clock or a fixed
 * jitter source without touching the wiring.
 */
import type { ProviderConfig } from '@core/config';
import type { IClock } from '@domain/interfaces/IClock';
import type { ISportsProvider } from '@domain/interfaces/ISportsProvider';
import { AppError, ERROR_CODES } from '@shared/errors/AppError';

import { RateLimiter } from '../http/RateLimiter';
import { type FetchFn, RetryingCaller } from '../http/RetryingCaller';
import { OpenLigaProvider } from './OpenLigaProvider';

export interface ProviderOverrides {
  fetch?: FetchFn;
  clock?: IClock;
  random?: () => number;
}

type ProviderBuilder = (caller: RetryingCaller) => ISportsProvider;

const PROVIDERS: Readonly<Record<string, ProviderBuilder>> = {
  openliga: (caller) => new OpenLigaProvider(caller),
};

export const SUPPORTED_PROVIDERS = Object.keys(PROVIDERS);

export function createProvider(
  providerConfig: ProviderConfig,
  overrides: ProviderOverrides = {},
): ISportsProvider {
  const build = PROVIDERS[providerConfig.name];
  if (!build) {
    throw new AppError(`Unknown provider: ${providerConfig.name}`, ERROR_CODES.INTERNAL_ERROR, {
      supported_providers: SUPPORTED_PROVIDERS,
    });
  }

  const limiter = new RateLimiter({
    maxRequests: providerConfig.rateLimit.maxRequests,
    windowMs: providerConfig.rateLimit.windowMs,
    clock: overrides.clock,
  });

  const caller = new RetryingCaller({
    baseUrl: providerConfig.baseUrl,
    policy: providerConfig.retry,
    limiter,
    timeoutMs: providerConfig.timeoutMs,
    fetch: overrides.fetch,
    clock: overrides.clock,
    random: overrides.random,
  });

  return build(caller);
}
