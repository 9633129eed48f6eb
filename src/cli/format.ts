/**
 * Text rendering of diagnostics for terminal output
 */

import type { Diagnostic } from '@/validation/core-types';

function describeDetails(d: Diagnostic): string | null {
  if (d.allowed) return `allowed: ${d.allowed.join(', ')}`;
  if (d.range) {
    const min = d.range.min ?? '';
    const max = d.range.max ?? '';
    return `range: ${min}..${max}`;
  }
  if (d.pattern) return `pattern: ${d.pattern}`;
  return null;
}

/**
 * One diagnostic as one or two lines
 */
export function formatDiagnostic(d: Diagnostic): string {
  const head = `✗ ${d.path === '' ? '(document)' : d.path} [${d.kind}] ${d.message}`;
  const details = describeDetails(d);
  return details ? `${head}\n    ${details}` : head;
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[], source: string): string[] {
  const noun = diagnostics.length === 1 ? 'problem' : 'problems';
  return [...diagnostics.map(formatDiagnostic), '', `${diagnostics.length} ${noun} found in ${source}`];
}
