/**
 * Diagnostic model shared by every validator
 */

import type { Logger } from 'pino';
import type { Result } from '@/types/core';
import type { NormalizedSection } from './normalizer';

export const DIAGNOSTIC_KINDS = [
  'TypeMismatch',
  'OutOfRange',
  'PatternMismatch',
  'EnumViolation',
  'MissingRequiredField',
  'ConflictingFields',
  'CrossFieldConstraintViolation',
] as const;

export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export interface DiagnosticRange {
  readonly min?: number;
  readonly max?: number;
}

/**
 * One validation failure
 */
export interface Diagnostic {
  /** Dotted field path, e.g. `node_pools.workload.min_count` */
  readonly path: string;
  readonly kind: DiagnosticKind;
  readonly message: string;
  /** The offending value, when there is one */
  readonly value?: unknown;
  readonly allowed?: readonly string[];
  readonly pattern?: string;
  readonly range?: DiagnosticRange;
}

type DiagnosticDetails = Omit<Diagnostic, 'path' | 'kind' | 'message'>;

export function diagnostic(
  kind: DiagnosticKind,
  path: string,
  message: string,
  details: DiagnosticDetails = {},
): Diagnostic {
  return { path, kind, message, ...details };
}

/**
 * Join path segments with dots, skipping the empty root segment
 */
export function joinPath(parent: string, key: string | number): string {
  return parent === '' ? String(key) : `${parent}.${key}`;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Context passed through one validation run
 */
export interface ValidationContext {
  readonly logger: Logger;
}

/**
 * Outcome of validating one section: its canonical form (`null` for an absent
 * optional section), or every diagnostic found in it
 */
export type SectionOutcome = Result<NormalizedSection | null, Diagnostic[]>;
