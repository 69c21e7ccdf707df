/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * RequestContext is the one value threaded explicitly from the HTTP boundary
 * through the dispatcher, the provider, the retrying caller and the rate
 * limiter. It carries the request id, the request-scoped logger (so audit
 * lines are tagged without any ambient lookup) and an optional AbortSignal
 * that fires when the caller goes away.
 */
import type { Logger } from '@core/logger';

export interface RequestContext {
  requestId: string;
  log: Logger;
  signal?: AbortSignal;
}

/** Response body of a successful POST /proxy/execute. */
export interface ProxyExecuteResponse<T = unknown> {
  requestId: string;
  operationType: string;
  data: T;
}
