/**
 * 404 Fallback
 * Layer: Interfaces (HTTP)
 *
 * Registered after every router: anything that reaches it matched no route.
 * It throws instead of responding so the error handler keeps the one
 * response format (and request id) for every failure.
 */
import { PROXY_EXECUTE_PATH } from '@shared/constants';
import { NotFoundError } from '@shared/errors/AppError';
import type { Request, Response } from 'express';

export const USAGE_HINT = `Use POST ${PROXY_EXECUTE_PATH} for operations`;

export function notFound(_req: Request, _res: Response): void {
  throw new NotFoundError('Endpoint not found', USAGE_HINT);
}
