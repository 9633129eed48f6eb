/**
 * Maintenance Window Resolver
 *
 * Validates and normalizes one recurring maintenance schedule. Both windows of
 * a cluster use this resolver; they differ only in the frequencies their
 * registry entry allows.
 *
 * Order of checks:
 * 1. absent window: skipped
 * 2. field rules from the registry (duration 4..24, interval >= 1, formats)
 * 3. frequency companions: required fields present, foreign ones absent
 * 4. interval upper bound for the frequency
 * 5. every blackout period, end after start
 */

import { ALLOWED, MAINTENANCE, type MaintenanceFrequency } from '@/config/constants';
import type { SectionDefinition } from '@/config/registry';
import { Failure, Success } from '@/types/core';
import {
  diagnostic,
  joinPath,
  type Diagnostic,
  type SectionOutcome,
  type ValidationContext,
} from './core-types';
import { normalizeSection, type NormalizedSection } from './normalizer';
import {
  checkSection,
  describeShape,
  integerField,
  isSupplied,
  stringField,
  type SectionCheck,
} from './section-validator';

type CompanionField = 'day_of_week' | 'day_of_month' | 'week_index';

const COMPANION_FIELDS: readonly CompanionField[] = ['day_of_week', 'day_of_month', 'week_index'];

/**
 * Companion fields each frequency requires
 */
export const FREQUENCY_COMPANIONS: Readonly<Record<MaintenanceFrequency, readonly CompanionField[]>> = {
  Daily: [],
  Weekly: ['day_of_week'],
  AbsoluteMonthly: ['day_of_month'],
  RelativeMonthly: ['week_index', 'day_of_week'],
};

function asFrequency(value: string | undefined): MaintenanceFrequency | undefined {
  return ALLOWED.nodeOsFrequency.find((frequency) => frequency === value);
}

const DATE_PARTS = /^([0-9]{4})-([0-9]{2})-([0-9]{2})/;

/**
 * True when the leading YYYY-MM-DD of the text names a real calendar day
 */
export function isCalendarDate(text: string): boolean {
  const match = DATE_PARTS.exec(text);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

function calendarDiagnostics(check: SectionCheck, fields: readonly string[]): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const field of fields) {
    const value = stringField(check, field);
    if (value !== undefined && !isCalendarDate(value)) {
      diagnostics.push(
        diagnostic(
          'PatternMismatch',
          joinPath(check.path, field),
          `Value "${value}" is not a real calendar date`,
          { value },
        ),
      );
    }
  }
  return diagnostics;
}

function frequencyDiagnostics(check: SectionCheck): Diagnostic[] {
  const frequency = asFrequency(stringField(check, 'frequency'));
  if (frequency === undefined) return [];

  const required = FREQUENCY_COMPANIONS[frequency];
  const diagnostics: Diagnostic[] = [];

  for (const field of required) {
    if (!isSupplied(check, field)) {
      diagnostics.push(
        diagnostic(
          'MissingRequiredField',
          joinPath(check.path, field),
          `${field} is required when frequency is ${frequency}`,
        ),
      );
    }
  }

  for (const field of COMPANION_FIELDS) {
    if (!required.includes(field) && isSupplied(check, field)) {
      diagnostics.push(
        diagnostic(
          'ConflictingFields',
          check.path,
          `${field} cannot be set when frequency is ${frequency}`,
          { value: { frequency, [field]: check.raw[field] } },
        ),
      );
    }
  }

  const interval = integerField(check, 'interval');
  const maxInterval = MAINTENANCE.MAX_INTERVAL[frequency];
  if (interval !== undefined && interval > maxInterval) {
    diagnostics.push(
      diagnostic(
        'OutOfRange',
        joinPath(check.path, 'interval'),
        `Value ${interval} is outside the allowed range 1..${maxInterval} for frequency ${frequency}`,
        { value: interval, range: { min: 1, max: maxInterval } },
      ),
    );
  }

  return diagnostics;
}

/**
 * Validate one blackout period
 */
function resolveBlackoutPeriod(
  raw: unknown,
  def: SectionDefinition,
  path: string,
  context: ValidationContext,
): SectionOutcome {
  const check = checkSection(raw, def, path, context);
  const diagnostics = [...check.diagnostics, ...calendarDiagnostics(check, ['start', 'end'])];

  const start = stringField(check, 'start');
  const end = stringField(check, 'end');
  if (diagnostics.length === 0 && start !== undefined && end !== undefined) {
    if (Date.parse(end) <= Date.parse(start)) {
      diagnostics.push(
        diagnostic(
          'CrossFieldConstraintViolation',
          path,
          `end (${end}) must be later than start (${start})`,
          { value: { start, end } },
        ),
      );
    }
  }

  if (diagnostics.length > 0) return Failure(diagnostics);
  return Success(normalizeSection(check));
}

function compareInstants(a: NormalizedSection, b: NormalizedSection, key: string): number {
  const left = a[key];
  const right = b[key];
  if (typeof left !== 'string' || typeof right !== 'string') return 0;
  return Date.parse(left) - Date.parse(right) || left.localeCompare(right);
}

/**
 * Canonical set order: by start, then by end; exact duplicates collapse
 */
export function sortBlackoutPeriods(periods: readonly NormalizedSection[]): NormalizedSection[] {
  const seen = new Set<string>();
  return [...periods]
    .sort((a, b) => compareInstants(a, b, 'start') || compareInstants(a, b, 'end'))
    .filter((period) => {
      const identity = `${String(period.start)}/${String(period.end)}`;
      if (seen.has(identity)) return false;
      seen.add(identity);
      return true;
    });
}

/**
 * Validate every blackout period of a window; one failure never hides another
 */
function resolveBlackoutPeriods(
  check: SectionCheck,
  context: ValidationContext,
): { periods: NormalizedSection[]; diagnostics: Diagnostic[] } {
  const collection = check.definition.collections?.not_allowed;
  const raw = check.raw.not_allowed;
  const path = joinPath(check.path, 'not_allowed');

  if (!collection || raw === undefined || raw === null) {
    return { periods: [], diagnostics: [] };
  }
  if (!Array.isArray(raw)) {
    return {
      periods: [],
      diagnostics: [
        diagnostic('TypeMismatch', path, `Expected array, received ${describeShape(raw)}`, {
          value: raw,
        }),
      ],
    };
  }

  const periods: NormalizedSection[] = [];
  const diagnostics: Diagnostic[] = [];
  raw.forEach((entry: unknown, index: number) => {
    const outcome = resolveBlackoutPeriod(entry, collection.entry, joinPath(path, index), context);
    if (!outcome.ok) {
      diagnostics.push(...outcome.error);
    } else if (outcome.value) {
      periods.push(outcome.value);
    }
  });

  return { periods: sortBlackoutPeriods(periods), diagnostics };
}

/**
 * Resolve one maintenance window into its canonical form
 */
export function resolveMaintenanceWindow(
  raw: unknown,
  def: SectionDefinition,
  path: string,
  context: ValidationContext,
): SectionOutcome {
  const check = checkSection(raw, def, path, context);
  if (!check.present) {
    return check.diagnostics.length > 0 ? Failure([...check.diagnostics]) : Success(null);
  }

  const blackout = resolveBlackoutPeriods(check, context);
  const diagnostics = [
    ...check.diagnostics,
    ...calendarDiagnostics(check, ['start_date']),
    ...frequencyDiagnostics(check),
    ...blackout.diagnostics,
  ];

  if (diagnostics.length > 0) {
    context.logger.debug({ path, count: diagnostics.length }, 'Maintenance window rejected');
    return Failure(diagnostics);
  }

  return Success(normalizeSection(check, { not_allowed: blackout.periods }));
}
