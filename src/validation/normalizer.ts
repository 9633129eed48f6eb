/**
 * Normalizer
 *
 * Fills registry defaults into a section that passed validation and puts the
 * result in canonical form: declaration order, sets de-duplicated and sorted,
 * map keys sorted, `null` for optional fields without a default.
 */

import type { FieldDefinition, FieldValue } from '@/config/registry';
import { EngineInvariantError } from '@/lib/errors';
import { isStringArray, type SectionCheck } from './section-validator';

export type NormalizedValue =
  | FieldValue
  | null
  | NormalizedSection
  | readonly NormalizedSection[]
  | Readonly<Record<string, NormalizedSection>>;

export interface NormalizedSection {
  readonly [key: string]: NormalizedValue;
}

export function sortedUnique(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

export function sortedRecord<T>(record: Readonly<Record<string, T>>): Record<string, T> {
  const sorted: Record<string, T> = {};
  for (const key of Object.keys(record).sort()) {
    const value = record[key];
    if (value !== undefined) sorted[key] = value;
  }
  return sorted;
}

function isStringRecord(value: FieldValue): value is Readonly<Record<string, string>> {
  return typeof value === 'object' && !isStringArray(value);
}

/**
 * Canonical form of one field value, default applied
 */
export function normalizeField(def: FieldDefinition, value: FieldValue | undefined): FieldValue | null {
  const resolved = value ?? def.default;
  if (resolved === undefined) return null;

  if (isStringArray(resolved)) {
    return def.type === 'string-set' ? sortedUnique(resolved) : [...resolved];
  }
  if (isStringRecord(resolved)) {
    return sortedRecord(resolved);
  }
  return resolved;
}

/**
 * Canonical values of a section's own fields, without nested sections
 */
export function normalizeFields(check: SectionCheck): Record<string, NormalizedValue> {
  const normalized: Record<string, NormalizedValue> = {};
  for (const [key, def] of Object.entries(check.definition.fields)) {
    normalized[key] = normalizeField(def, check.values.get(key));
  }
  return normalized;
}

/**
 * Normalize a validated section. Collections are normalized by their own
 * checkers and passed in; they are placed after fields and nested sections.
 */
export function normalizeSection(
  check: SectionCheck,
  collections: Readonly<Record<string, NormalizedValue>> = {},
): NormalizedSection | null {
  if (check.diagnostics.length > 0) {
    throw new EngineInvariantError('Refusing to normalize a section that failed validation', {
      path: check.path,
    });
  }
  if (!check.present) return null;

  const normalized: Record<string, NormalizedValue> = normalizeFields(check);

  for (const [key, nested] of check.sections) {
    normalized[key] = normalizeSection(nested);
  }

  for (const key of Object.keys(check.definition.collections ?? {})) {
    normalized[key] = collections[key] ?? null;
  }

  return normalized;
}
