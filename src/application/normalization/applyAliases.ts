import type { AliasSpec } from '@domain/entities/NormalizedRecords';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Renames keys from intermediate to canonical names, recursing into the
 * nested records `spec.fields` names. Arrays are renamed element-wise; keys
 * without a rule are kept as they are. The input is never mutated.
 */
export function applyAliases(value: unknown, spec: AliasSpec): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => applyAliases(item, spec));
  }
  if (!isPlainRecord(value)) {
    return value;
  }

  const renamed: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const target = spec.rename?.[key] ?? key;
    const nested = spec.fields?.[target];
    renamed[target] = nested ? applyAliases(inner, nested) : inner;
  }
  return renamed;
}
