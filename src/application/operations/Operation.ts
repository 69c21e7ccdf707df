/**
 * Operation Descriptor
 * Layer: Application
 *
 * An Operation ties together everything the dispatcher needs for one named
 * unit of work:
 *
 *   payloadSchema — what a valid input looks like
 *   method        — which provider capability to call
 *   extractArgs   — how a validated payload becomes that method's arguments
 *   outputSchema  — what the caller is promised back (plus its alias rules)
 *
 * `defineOperation` is generic, so the compiler checks that extractArgs
 * takes the parsed payload type and returns exactly the argument tuple of
 * `method`. The returned Operation hides those type parameters behind
 * `prepare()` / `normalize()`, which is what lets operations of different
 * shapes live in one registry map.
 */
import type { AliasSpec, OperationOutput } from '@domain/entities/NormalizedRecords';
import type {
  ISportsProvider,
  ProviderArgMap,
  ProviderMethodName,
  ProviderResultMap,
} from '@domain/interfaces/ISportsProvider';
import {
  type FieldViolation,
  type NormalizationError,
  type UpstreamError,
  ValidationError,
} from '@shared/errors/AppError';
import type { RequestContext } from '@shared/types';
import { err, ok, type Result, type ResultAsync } from 'neverthrow';
import { z } from 'zod/v4';

import { normalizeRecord } from '../normalization/normalizeRecord';

export interface OperationDefinition<K extends ProviderMethodName, TPayloadSchema extends z.ZodType> {
  name: string;
  method: K;
  payloadSchema: TPayloadSchema;
  outputSchema: z.ZodType<OperationOutput>;
  aliases: AliasSpec;
  extractArgs: (payload: z.output<TPayloadSchema>) => ProviderArgMap[K];
}

/** A validated payload turned into a ready-to-run provider call. */
export interface PreparedCall {
  readonly args: readonly unknown[];
  invoke(provider: ISportsProvider, ctx: RequestContext): ResultAsync<unknown, UpstreamError>;
}

type JsonSchema = z.core.JSONSchema.BaseSchema;

export interface OperationDescription {
  method: ProviderMethodName;
  payload_schema: JsonSchema;
  response_schema: JsonSchema;
}

export interface Operation {
  readonly name: string;
  readonly method: ProviderMethodName;
  prepare(payload: unknown): Result<PreparedCall, ValidationError>;
  normalize(raw: unknown): Result<OperationOutput, NormalizationError>;
  describe(): OperationDescription;
}

function callProvider<K extends ProviderMethodName>(
  provider: ISportsProvider,
  method: K,
  ctx: RequestContext,
  args: ProviderArgMap[K],
): ResultAsync<ProviderResultMap[K], UpstreamError> {
  return provider[method](ctx, ...args);
}

function valueAt(source: unknown, path: readonly PropertyKey[]): unknown {
  let current = source;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

export function toFieldViolations(error: z.ZodError, payload: unknown): FieldViolation[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.') || 'payload',
    message: issue.message,
    type:
      issue.code === 'invalid_type' && issue.path.length > 0 && valueAt(payload, issue.path) === undefined
        ? 'missing'
        : issue.code,
  }));
}

export function defineOperation<K extends ProviderMethodName, TPayloadSchema extends z.ZodType>(
  definition: OperationDefinition<K, TPayloadSchema>,
): Operation {
  const { name, method, payloadSchema, outputSchema, aliases, extractArgs } = definition;

  return Object.freeze({
    name,
    method,

    prepare(payload: unknown): Result<PreparedCall, ValidationError> {
      const parsed = payloadSchema.safeParse(payload);
      if (!parsed.success) {
        return err(
          new ValidationError('Payload validation failed', toFieldViolations(parsed.error, payload)),
        );
      }

      const args = extractArgs(parsed.data);
      return ok({
        args,
        invoke: (provider: ISportsProvider, ctx: RequestContext) =>
          callProvider(provider, method, ctx, args),
      });
    },

    normalize(raw: unknown): Result<OperationOutput, NormalizationError> {
      return normalizeRecord(raw, outputSchema, aliases);
    },

    describe(): OperationDescription {
      return {
        method,
        payload_schema: z.toJSONSchema(payloadSchema, { io: 'input' }),
        response_schema: z.toJSONSchema(outputSchema, { io: 'output', unrepresentable: 'any' }),
      };
    },
  });
}
