/**
 * Contextual guidance module for CLI output
 * Turns diagnostic kinds and structural error codes into next steps
 */

import type { ErrorCode } from '@/lib/errors';
import { DIAGNOSTIC_KINDS, type Diagnostic, type DiagnosticKind } from '@/validation/core-types';

export interface GuidanceOptions {
  dev?: boolean;
}

/**
 * One hint per diagnostic kind
 */
const KIND_HINTS: Record<DiagnosticKind, string> = {
  TypeMismatch: 'Check value types: numbers unquoted, strings quoted, sets and lists as arrays',
  OutOfRange: 'Bring numeric values inside the range shown in the message',
  PatternMismatch: 'Compare the value with the expected format (see: cluster-config schema)',
  EnumViolation: 'Use one of the listed values; matching is case-sensitive',
  MissingRequiredField: 'Add the missing field, or remove the field that requires it',
  ConflictingFields: 'Remove one of the conflicting fields',
  CrossFieldConstraintViolation: 'Adjust the related fields so that they agree (e.g. min <= max)',
};

const STRUCTURAL_HINTS: Partial<Record<ErrorCode, string[]>> = {
  DOCUMENT_UNREADABLE: ['Verify the file path and read permissions'],
  DOCUMENT_TOO_LARGE: ['Raise the limit with CLUSTER_CONFIG_MAX_BYTES if the document is legitimate'],
  DOCUMENT_UNPARSEABLE: [
    'Check the syntax near the reported position',
    'Force the decoder with --format json|yaml',
  ],
  DOCUMENT_SHAPE: ['The document must be a single mapping with the cluster fields at the top level'],
};

/**
 * Hints for the kinds present in a diagnostic list, in kind order
 */
export function guidanceForDiagnostics(diagnostics: readonly Diagnostic[]): string[] {
  const present = new Set(diagnostics.map((d) => d.kind));
  return DIAGNOSTIC_KINDS.filter((kind) => present.has(kind)).map((kind) => KIND_HINTS[kind]);
}

export function guidanceForStructuralError(code: ErrorCode): string[] {
  return STRUCTURAL_HINTS[code] ?? [];
}

/**
 * Provide guidance for an unexpected error
 * @param error - The error that occurred
 * @param write - Line writer (stderr)
 */
export function provideContextualGuidance(
  error: Error,
  write: (line: string) => void,
  options: GuidanceOptions = {},
): void {
  write(`Error: ${error.message}`);
  write('This is not a problem with the configuration document.');

  if (options.dev && error.stack) {
    write('Stack trace:');
    write(error.stack);
  } else if (!options.dev) {
    write('For detailed error information, use --dev');
  }
}
