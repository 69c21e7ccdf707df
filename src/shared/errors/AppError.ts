/**
 * Custom Error Hierarchy
 * Layer: Shared
 *
 * Every failure the proxy reports falls into one of four buckets, each with a
 * stable `code` that callers can switch on:
 *
 *   UNKNOWN_OPERATION — the operation name is not in the registry.
 *   VALIDATION_ERROR  — the payload (or request body) fails its declared shape.
 *   UPSTREAM_ERROR    — the provider call failed after retries, returned a
 *                       non-retryable status, or reported "not found".
 *   INTERNAL_ERROR    — the adapter output does not match the output schema.
 *
 * The core never picks an HTTP status. It emits the code; the HTTP layer
 * (interfaces/http/statusCodes.ts) maps codes to statuses. NOT_FOUND and
 * METHOD_NOT_ALLOWED only exist for the HTTP front-end's own routing.
 *
 * The `isOperational` flag still distinguishes expected failures from
 * programmer errors: the global error handler only echoes the message of an
 * operational error and answers everything else with a generic 500.
 *
 * Why `Object.setPrototypeOf(this, new.target.prototype)`?
 *   When you `extends Error`, the prototype chain can break in some
 *   compilation targets, making `instanceof AppError` return false. This line
 *   fixes the chain so `err instanceof UpstreamError` is reliable.
 */
export const ERROR_CODES = {
  UNKNOWN_OPERATION: 'UNKNOWN_OPERATION',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  METHOD_NOT_ALLOWED: 'METHOD_NOT_ALLOWED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type ErrorDetails = Record<string, unknown>;

/** Wire shape of every error response body. */
export interface ErrorPayload {
  error: string;
  code: ErrorCode;
  details?: ErrorDetails;
}

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode = ERROR_CODES.INTERNAL_ERROR,
    details?: ErrorDetails,
    isOperational = true,
  ) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toPayload(): ErrorPayload {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

export class UnknownOperationError extends AppError {
  constructor(operationType: string, validOperations: readonly string[]) {
    super(`Unknown operationType: ${operationType}`, ERROR_CODES.UNKNOWN_OPERATION, {
      valid_operations: [...validOperations],
    });
  }
}

/** One entry per failing field. `type` is `missing` for an absent required field. */
export interface FieldViolation {
  field: string;
  message: string;
  type: string;
}

export class ValidationError extends AppError {
  public readonly violations: FieldViolation[];

  constructor(message: string, violations: FieldViolation[] = []) {
    super(
      message,
      ERROR_CODES.VALIDATION_ERROR,
      violations.length > 0 ? { validation_errors: violations } : undefined,
    );
    this.violations = violations;
  }
}

export interface UpstreamErrorOptions {
  /** Last HTTP status seen, when the failure came from a response. */
  status?: number;
  cause?: unknown;
}

/**
 * Raised (as a Result error) by the rate-limited caller and the provider
 * adapter. The message is the short reason; on the wire it moves to
 * `details.message` under a fixed `error` string.
 */
export class UpstreamError extends AppError {
  public readonly status?: number;

  constructor(message: string, options: UpstreamErrorOptions = {}) {
    super(message, ERROR_CODES.UPSTREAM_ERROR);
    this.status = options.status;
    if (options.cause !== undefined) this.cause = options.cause;
  }

  toPayload(): ErrorPayload {
    return {
      error: 'Upstream API failed',
      code: this.code,
      details: { message: this.message },
    };
  }
}

/**
 * The adapter produced a record that does not satisfy its output schema.
 * This means the adapter and schema drifted apart — retrying cannot help.
 */
export class NormalizationError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('Internal response normalization error', ERROR_CODES.INTERNAL_ERROR, {
      message: 'Provider response format unexpected',
    });
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, hint?: string) {
    super(message, ERROR_CODES.NOT_FOUND, hint !== undefined ? { message: hint } : undefined);
  }
}

export class MethodNotAllowedError extends AppError {
  constructor(hint: string) {
    super('Method not allowed', ERROR_CODES.METHOD_NOT_ALLOWED, { message: hint });
  }
}

/** The dispatcher only ever fails with one of these. */
export type OperationError =
  | UnknownOperationError
  | ValidationError
  | UpstreamError
  | NormalizationError;
