/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * In Express, middleware forms an **assembly line**: each piece processes the
 * request and passes it to the next one. The error handler sits at the very
 * END of the line — it's the safety net that catches anything that went
 * wrong upstream.
 *
 * Express 5 natively catches rejected promises from async handlers and
 * funnels them here, so controllers just throw.
 *
 * Three kinds of error arrive here:
 *   - Operational (AppError): expected failures. Logged at "warn"; the body is
 *     the error's own payload, the status comes from its code.
 *   - Body-parser failures (malformed JSON, wrong content length): reported
 *     as VALIDATION_ERROR, since the request never reached validation.
 *   - Programmer errors: anything else. Logged at "error"; the client gets a
 *     generic INTERNAL_ERROR with no message or stack from the exception.
 *
 * Every error body carries `requestId`, and so does the response header.
 *
 * Express recognizes this as an error handler because it has FOUR parameters
 * (err, req, res, next).
 */
import { logger } from '@core/logger';
import { AppError, ERROR_CODES, ValidationError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

import { statusForCode } from '../statusCodes';
import { REQUEST_ID_HEADER, resolveRequestId } from './requestLogger';

/** body-parser tags its errors with a `type` and an HTTP-ish `status`. */
function isBodyParserError(err: unknown): err is Error & { type: string; status: number } {
  return (
    err instanceof Error &&
    'type' in err &&
    typeof err.type === 'string' &&
    err.type.startsWith('entity.') &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = resolveRequestId(req);
  res.setHeader(REQUEST_ID_HEADER, requestId);

  const appError = isBodyParserError(err)
    ? new ValidationError(err.type === 'entity.parse.failed' ? 'Invalid JSON in request body' : err.message)
    : err;

  if (appError instanceof AppError && appError.isOperational) {
    const statusCode = statusForCode(appError.code);
    logger.warn({ reqId: requestId, statusCode, code: appError.code, message: appError.message }, 'Operational error');
    res.status(statusCode).json({ ...appError.toPayload(), requestId });
    return;
  }

  logger.error({ reqId: requestId, err }, 'Unhandled error');
  res.status(500).json({
    error: 'Internal server error',
    code: ERROR_CODES.INTERNAL_ERROR,
    requestId,
  });
}
