/**
 * Error Code → HTTP Status
 * Layer: Interfaces (HTTP)
 *
 * The core reports failures as codes only. This table is the one place that
 * turns a code into a status; anything not listed is a client error (400).
 */
import { ERROR_CODES, type ErrorCode } from '@shared/errors/AppError';

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ERROR_CODES.NOT_FOUND]: 404,
  [ERROR_CODES.METHOD_NOT_ALLOWED]: 405,
  [ERROR_CODES.UPSTREAM_ERROR]: 502,
  [ERROR_CODES.INTERNAL_ERROR]: 500,
};

export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code] ?? 400;
}
