/**
 * Audit Events
 * Layer: Core
 *
 * The pipeline reports what happened at each boundary (payload validation,
 * provider call, upstream attempt, backoff, normalization) as one structured
 * record per event. Every record carries a `stage` and, where it applies, an
 * `outcome`; the rest are contextual fields.
 *
 * Events are written through the request's child logger, so the request id
 * is attached by pino and nothing here reads global state.
 */
import type { Logger } from './logger';

export const AUDIT_STAGES = [
  'proxy_start',
  'proxy_complete',
  'validation',
  'provider_call',
  'provider_response',
  'response_normalization',
  'rate_limit',
  'upstream_request',
  'upstream_response',
  'retry_backoff',
  'request_exception',
  'upstream_error',
] as const;

export type AuditStage = (typeof AUDIT_STAGES)[number];

export type AuditOutcome = 'pass' | 'fail' | 'success' | 'error' | 'waiting';

export interface AuditEvent {
  stage: AuditStage;
  outcome?: AuditOutcome;
  [field: string]: unknown;
}

export function audit(log: Logger, event: AuditEvent): void {
  if (event.stage === 'response_normalization' && event.outcome === 'error') {
    log.error(event, event.stage);
    return;
  }
  if (event.outcome === 'fail' || event.outcome === 'error') {
    log.warn(event, event.stage);
    return;
  }
  log.info(event, event.stage);
}
