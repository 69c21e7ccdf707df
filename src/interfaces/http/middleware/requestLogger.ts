/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Wraps Pino's HTTP plugin to log every incoming request and outgoing
 * response with method, URL, status code and response time. It reuses the
 * logger from core/logger.ts, so the format (JSON in prod, pretty in dev) is
 * the same everywhere.
 *
 * It also owns the request id. The first of these wins:
 *   1. the `x-request-id` header
 *   2. `requestId` in the (already parsed) JSON body
 *   3. a fresh UUID
 * The id is echoed back in the `x-request-id` response header, and the
 * request's child logger (`req.log`) is bound to it, so every audit line
 * written through that logger carries the same `reqId`.
 *
 * Must run after express.json() so the body is available here.
 */
import { randomUUID } from 'node:crypto';

import { logger } from '@core/logger';
import type { Request, Response } from 'express';
import pinoHttp from 'pino-http';

export const REQUEST_ID_HEADER = 'x-request-id';

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Header first, then body; undefined when the client supplied neither. */
export function clientRequestId(req: Request): string | undefined {
  const body: unknown = req.body;
  const fromBody =
    typeof body === 'object' && body !== null && 'requestId' in body
      ? nonEmpty(body.requestId)
      : undefined;
  return nonEmpty(req.get(REQUEST_ID_HEADER)) ?? fromBody;
}

/**
 * The id pino-http assigned, or (for a request that failed before reaching
 * the logger, e.g. malformed JSON) whatever the client sent.
 */
export function resolveRequestId(req: Request): string {
  return typeof req.id === 'string' ? req.id : (clientRequestId(req) ?? randomUUID());
}

export const requestLogger = pinoHttp<Request, Response>({
  logger,
  quietReqLogger: true,
  genReqId: (req, res) => {
    const id = clientRequestId(req) ?? randomUUID();
    res.setHeader(REQUEST_ID_HEADER, id);
    return id;
  },
});
