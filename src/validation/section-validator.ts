/**
 * Section walk
 *
 * Runs the Field Validator over every field a section declares and recurses
 * into nested sections. An absent optional section short-circuits: none of its
 * nested fields are looked at. Collections declared by the section are left to
 * their specialized checkers.
 */

import type { FieldValue, SectionDefinition } from '@/config/registry';
import { validateField } from './field-validator';
import {
  diagnostic,
  isPlainObject,
  joinPath,
  type Diagnostic,
  type ValidationContext,
} from './core-types';

export interface SectionCheck {
  readonly path: string;
  readonly definition: SectionDefinition;
  /** False for an absent optional section, or when the section itself is malformed */
  readonly present: boolean;
  /** Explicit values that passed their field checks */
  readonly values: ReadonlyMap<string, FieldValue>;
  /** Fields that failed their checks */
  readonly rejected: ReadonlySet<string>;
  readonly sections: ReadonlyMap<string, SectionCheck>;
  /** Raw input of the section, for collection checkers */
  readonly raw: Readonly<Record<string, unknown>>;
  /** Field-level diagnostics of this section and its nested sections */
  readonly diagnostics: readonly Diagnostic[];
}

function emptyCheck(
  def: SectionDefinition,
  path: string,
  diagnostics: Diagnostic[] = [],
): SectionCheck {
  return {
    path,
    definition: def,
    present: false,
    values: new Map(),
    rejected: new Set(),
    sections: new Map(),
    raw: {},
    diagnostics,
  };
}

function warnUnknownKeys(
  raw: Record<string, unknown>,
  def: SectionDefinition,
  path: string,
  context: ValidationContext,
): void {
  for (const key of Object.keys(raw)) {
    const known =
      key in def.fields ||
      (def.sections !== undefined && key in def.sections) ||
      (def.collections !== undefined && key in def.collections);
    if (!known) {
      context.logger.warn({ path: joinPath(path, key) }, 'Ignoring unknown configuration field');
    }
  }
}

export interface CheckSectionOptions {
  /** Walk nested sections as well (default true) */
  readonly nested?: boolean;
}

/**
 * Validate every field of a section, then its nested sections
 */
export function checkSection(
  raw: unknown,
  def: SectionDefinition,
  path: string,
  context: ValidationContext,
  options: CheckSectionOptions = {},
): SectionCheck {
  if (raw === undefined || raw === null) {
    if (def.presence === 'required') {
      return emptyCheck(def, path, [
        diagnostic('MissingRequiredField', path, 'Required section is missing'),
      ]);
    }
    if (def.presence === 'optional') {
      return emptyCheck(def, path);
    }
    return checkSection({}, def, path, context, options);
  }

  if (!isPlainObject(raw)) {
    return emptyCheck(def, path, [
      diagnostic('TypeMismatch', path, `Expected object, received ${describeShape(raw)}`, {
        value: raw,
      }),
    ]);
  }

  warnUnknownKeys(raw, def, path, context);

  const values = new Map<string, FieldValue>();
  const rejected = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  for (const [key, fieldDef] of Object.entries(def.fields)) {
    const check = validateField(raw[key], fieldDef, joinPath(path, key));
    if (check.status === 'accepted') {
      values.set(key, check.value);
    } else if (check.status === 'rejected') {
      rejected.add(key);
      diagnostics.push(...check.diagnostics);
    }
  }

  const sections = new Map<string, SectionCheck>();
  const nestedSections = options.nested === false ? {} : (def.sections ?? {});
  for (const [key, sectionDef] of Object.entries(nestedSections)) {
    const nested = checkSection(raw[key], sectionDef, joinPath(path, key), context);
    sections.set(key, nested);
    diagnostics.push(...nested.diagnostics);
  }

  return { path, definition: def, present: true, values, rejected, sections, raw, diagnostics };
}

export function describeShape(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value;
}

// ===== Accessors used by section-level rules =====

/**
 * Value a field will have after normalization: the accepted explicit value, or
 * its declared default. `undefined` when the field failed validation or has
 * neither.
 */
export function effectiveValue(check: SectionCheck, key: string): FieldValue | undefined {
  if (check.rejected.has(key)) return undefined;
  return check.values.get(key) ?? check.definition.fields[key]?.default;
}

export function integerField(check: SectionCheck, key: string): number | undefined {
  const value = effectiveValue(check, key);
  return typeof value === 'number' ? value : undefined;
}

export function stringField(check: SectionCheck, key: string): string | undefined {
  const value = effectiveValue(check, key);
  return typeof value === 'string' ? value : undefined;
}

export function booleanField(check: SectionCheck, key: string): boolean | undefined {
  const value = effectiveValue(check, key);
  return typeof value === 'boolean' ? value : undefined;
}

export function isStringArray(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function stringsField(check: SectionCheck, key: string): readonly string[] | undefined {
  const value = effectiveValue(check, key);
  return isStringArray(value) ? value : undefined;
}

/**
 * True when the user supplied a value for the field, whether it passed or not
 */
export function isSupplied(check: SectionCheck, key: string): boolean {
  const raw = check.raw[key];
  return raw !== undefined && raw !== null;
}
