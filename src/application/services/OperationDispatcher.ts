/**
 * Operation Dispatcher — The Pipeline Entry Point
 * Layer: Application
 *
 * Given an operation name, a raw payload and the request context, I run one
 * execution through four stages and stop at the first failure:
 *
 *   1. Lookup    — name must be in the registry       → UNKNOWN_OPERATION
 *   2. Validate  — payload must satisfy its schema    → VALIDATION_ERROR
 *   3. Invoke    — call the provider (rate limit +
 *                  retries happen below me)           → UPSTREAM_ERROR
 *   4. Normalize — rename + validate the raw record   → INTERNAL_ERROR
 *
 * Every outcome is a Result: the caller gets either the normalized record or
 * one of the four OperationError classes, never a thrown exception for an
 * expected failure. I never retry anything myself — upstream failures were
 * already retried by the RetryingCaller, and the other three cannot be fixed
 * by trying again.
 *
 * The provider and the registry are injected, so tests can hand in a stub
 * provider; the registry is read-only after construction.
 */
import { audit } from '@core/audit';
import { TOKENS } from '@core/types';
import type { OperationOutput } from '@domain/entities/NormalizedRecords';
import type { ISportsProvider } from '@domain/interfaces/ISportsProvider';
import {
  type OperationError,
  UnknownOperationError,
  UpstreamError,
} from '@shared/errors/AppError';
import type { RequestContext } from '@shared/types';
import { err, ok, type Result } from 'neverthrow';
import { inject, injectable } from 'tsyringe';

import type { OperationDescription, PreparedCall } from '../operations/Operation';
import type { OperationRegistry } from '../operations/operationRegistry';

@injectable()
export class OperationDispatcher {
  constructor(
    @inject(TOKENS.SportsProvider) private provider: ISportsProvider,
    @inject(TOKENS.OperationRegistry) private registry: OperationRegistry,
  ) {}

  /** Registry keys in registration order. */
  get operationNames(): string[] {
    return [...this.registry.keys()];
  }

  /** Per operation: the provider method plus payload and response JSON schemas. */
  describe(): Record<string, OperationDescription> {
    const described: Record<string, OperationDescription> = {};
    for (const [name, operation] of this.registry) {
      described[name] = operation.describe();
    }
    return described;
  }

  async execute(
    operationType: string,
    payload: unknown,
    ctx: RequestContext,
  ): Promise<Result<OperationOutput, OperationError>> {
    const operation = this.registry.get(operationType);
    if (!operation) {
      audit(ctx.log, {
        stage: 'validation',
        outcome: 'fail',
        reason: `Unknown operationType: ${operationType}`,
      });
      return err(new UnknownOperationError(operationType, this.operationNames));
    }

    const prepared = operation.prepare(payload);
    if (prepared.isErr()) {
      audit(ctx.log, {
        stage: 'validation',
        outcome: 'fail',
        operationType,
        reason: 'Payload validation failed',
        errors: prepared.error.violations,
      });
      return err(prepared.error);
    }
    audit(ctx.log, { stage: 'validation', outcome: 'pass', operationType });

    audit(ctx.log, {
      stage: 'provider_call',
      operationType,
      provider: this.provider.constructor.name,
      method: operation.method,
    });
    const raw = await this.invoke(prepared.value, ctx);
    if (raw.isErr()) {
      audit(ctx.log, {
        stage: 'provider_response',
        outcome: 'error',
        operationType,
        reason: raw.error.message,
      });
      return err(raw.error);
    }
    audit(ctx.log, { stage: 'provider_response', outcome: 'success', operationType });

    const normalized = operation.normalize(raw.value);
    if (normalized.isErr()) {
      audit(ctx.log, {
        stage: 'response_normalization',
        outcome: 'error',
        operationType,
        reason: 'Response normalization failed',
        errors: normalized.error.issues,
      });
      return err(normalized.error);
    }
    audit(ctx.log, { stage: 'response_normalization', outcome: 'success', operationType });

    return ok(normalized.value);
  }

  /**
   * A provider is supposed to report failure as an Err, but a thrown exception
   * or rejected promise is still an upstream-side failure for this execution.
   */
  private async invoke(call: PreparedCall, ctx: RequestContext): Promise<Result<unknown, UpstreamError>> {
    try {
      return await call.invoke(this.provider, ctx);
    } catch (cause) {
      ctx.log.error({ err: cause }, 'Provider call threw');
      const message = cause instanceof Error ? cause.message : String(cause);
      return err(new UpstreamError(message, { cause }));
    }
  }
}
