/**
 * Record Normalizer
 * Layer: Application
 *
 * "Rename, then validate": the adapter's RawRecord goes through its alias
 * rules and is parsed by the canonical Zod schema. Either every required
 * field is present with the right type and the parsed record comes back, or
 * a NormalizationError lists what was wrong — never a half-filled record.
 *
 * A failure here means the adapter and the schema disagree. It is reported as
 * INTERNAL_ERROR by the dispatcher, never as an upstream problem.
 */
import type { AliasSpec } from '@domain/entities/NormalizedRecords';
import { NormalizationError } from '@shared/errors/AppError';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod/v4';

import { applyAliases } from './applyAliases';

export function normalizeRecord<T>(
  raw: unknown,
  schema: z.ZodType<T>,
  aliases: AliasSpec,
): Result<T, NormalizationError> {
  const result = schema.safeParse(applyAliases(raw, aliases));

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`,
    );
    return err(new NormalizationError(issues));
  }

  return ok(result.data);
}
