/**
 * Field Validator
 *
 * Applies the per-field rules of a registry entry (type, pattern, enum, bounds)
 * to one raw value. Every check is a pure function of the value and its
 * definition; no field reads another field's result.
 *
 * Registry entries are compiled into zod schemas once and cached; zod issues
 * are then mapped onto diagnostic kinds.
 */

import { z } from 'zod';
import { PATTERNS } from '@/config/constants';
import type { FieldDefinition, FieldValue } from '@/config/registry';
import { diagnostic, joinPath, type Diagnostic } from './core-types';

export type FieldCheck =
  | { status: 'absent' }
  | { status: 'accepted'; value: FieldValue }
  | { status: 'rejected'; diagnostics: Diagnostic[] };

const compiledSchemas = new WeakMap<FieldDefinition, z.ZodType<FieldValue>>();

function toEnumValues(values: readonly string[]): [string, ...string[]] | null {
  const [first, ...rest] = values;
  return first === undefined ? null : [first, ...rest];
}

/**
 * Scalar string rule; also used for collection elements
 */
function stringSchema(def: FieldDefinition): z.ZodType<string> {
  const allowed = def.allowed ? toEnumValues(def.allowed) : null;
  if (allowed) {
    return z.enum(allowed);
  }

  let schema = z.string();
  if (def.min !== undefined) schema = schema.min(def.min);
  if (def.max !== undefined) schema = schema.max(def.max);
  if (def.pattern) schema = schema.regex(new RegExp(def.pattern.source, def.pattern.flags));
  return schema;
}

function integerSchema(def: FieldDefinition): z.ZodType<number> {
  let schema = z.number().int();
  if (def.min !== undefined) schema = schema.min(def.min);
  if (def.max !== undefined) schema = schema.max(def.max);
  return schema;
}

/**
 * Compile a registry entry into a zod schema (cached per entry)
 */
export function compileField(def: FieldDefinition): z.ZodType<FieldValue> {
  const cached = compiledSchemas.get(def);
  if (cached) return cached;

  let schema: z.ZodType<FieldValue>;
  switch (def.type) {
    case 'string':
      schema = stringSchema(def);
      break;
    case 'integer':
      schema = integerSchema(def);
      break;
    case 'boolean':
      schema = z.boolean();
      break;
    case 'string-set':
    case 'string-list':
      schema = z.array(stringSchema(def));
      break;
    case 'string-map':
      schema = z.record(z.string().regex(new RegExp(PATTERNS.mapKey)), z.string());
      break;
    default: {
      const unknownType: never = def.type;
      throw new Error(`Unsupported field type: ${String(unknownType)}`);
    }
  }

  compiledSchemas.set(def, schema);
  return schema;
}

function valueAt(raw: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = raw;
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, segment);
  }
  return current;
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : JSON.stringify(value) ?? String(value);
}

function describeRange(def: FieldDefinition): string {
  if (def.min !== undefined && def.max !== undefined) return `${def.min}..${def.max}`;
  if (def.min !== undefined) return `>= ${def.min}`;
  return `<= ${def.max}`;
}

function rangeOf(def: FieldDefinition): { min?: number; max?: number } {
  return {
    ...(def.min !== undefined && { min: def.min }),
    ...(def.max !== undefined && { max: def.max }),
  };
}

/**
 * Map one zod issue onto a diagnostic
 */
function toDiagnostic(issue: z.ZodIssue, def: FieldDefinition, path: string, raw: unknown): Diagnostic {
  const issuePath = issue.path.reduce<string>((acc, segment) => joinPath(acc, segment), path);
  const value = valueAt(raw, issue.path);

  switch (issue.code) {
    case z.ZodIssueCode.invalid_enum_value:
      return diagnostic(
        'EnumViolation',
        issuePath,
        `Value ${describeValue(value)} is not one of: ${issue.options.join(', ')}`,
        { value, allowed: issue.options.map(String) },
      );

    case z.ZodIssueCode.invalid_string: {
      const key = issue.path[issue.path.length - 1];
      if (def.type === 'string-map' && typeof key === 'string') {
        return diagnostic('PatternMismatch', issuePath, `Map key "${key}" is reserved`, {
          value: key,
          pattern: PATTERNS.mapKey,
        });
      }
      return diagnostic(
        'PatternMismatch',
        issuePath,
        `Value ${describeValue(value)} is not a valid ${def.pattern?.label ?? 'value'}`,
        { value, ...(def.pattern && { pattern: def.pattern.source }) },
      );
    }

    case z.ZodIssueCode.too_small:
    case z.ZodIssueCode.too_big: {
      const subject = issue.type === 'string' ? 'Length of value' : 'Value';
      const shown = issue.type === 'string' && typeof value === 'string' ? value.length : value;
      return diagnostic(
        'OutOfRange',
        issuePath,
        `${subject} ${describeValue(shown)} is outside the allowed range ${describeRange(def)}`,
        { value, range: rangeOf(def) },
      );
    }

    case z.ZodIssueCode.invalid_type:
      return diagnostic(
        'TypeMismatch',
        issuePath,
        `Expected ${issue.expected}, received ${issue.received}`,
        { value },
      );

    default:
      return diagnostic('TypeMismatch', issuePath, issue.message, { value });
  }
}

/**
 * Validate one raw value against its registry entry.
 * `null` and `undefined` both mean the field was not supplied.
 */
export function validateField(raw: unknown, def: FieldDefinition, path: string): FieldCheck {
  if (raw === undefined || raw === null) {
    if (def.required) {
      return {
        status: 'rejected',
        diagnostics: [diagnostic('MissingRequiredField', path, 'Required field is missing')],
      };
    }
    return { status: 'absent' };
  }

  const parsed = compileField(def).safeParse(raw);
  if (parsed.success) {
    return { status: 'accepted', value: parsed.data };
  }

  return {
    status: 'rejected',
    diagnostics: parsed.error.issues.map((issue) => toDiagnostic(issue, def, path, raw)),
  };
}
