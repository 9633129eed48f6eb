/**
 * Output Assembler
 *
 * Composes the normalized sections into one canonical ClusterConfig, or, if any
 * section failed, returns only the diagnostics of every section in order.
 * Fail-together: nothing partial ever leaves the engine.
 */

import type { Logger } from 'pino';
import { EngineInvariantError } from '@/lib/errors';
import { Failure, Success, type Result } from '@/types/core';
import type { Diagnostic } from '@/validation/core-types';
import type { NormalizedValue } from '@/validation/normalizer';
import { clusterConfigSchema, type ClusterConfig } from './canonical-schema';

/**
 * Outcome of one section, under the key it occupies in the root object.
 * Entries whose value is itself a bag of root fields use `key: null` and are
 * spread into the root.
 */
export interface SectionEntry {
  readonly key: string | null;
  readonly outcome: Result<NormalizedValue, Diagnostic[]>;
}

function isRecord(value: NormalizedValue): value is Readonly<Record<string, NormalizedValue>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Compose section outcomes into the final result
 */
export function assembleClusterConfig(
  entries: readonly SectionEntry[],
  logger: Logger,
): Result<ClusterConfig, Diagnostic[]> {
  const diagnostics = entries.flatMap((entry) => (entry.outcome.ok ? [] : entry.outcome.error));
  if (diagnostics.length > 0) {
    return Failure(diagnostics);
  }

  const composed: Record<string, NormalizedValue> = {};
  for (const entry of entries) {
    if (!entry.outcome.ok) continue;
    const value = entry.outcome.value;
    if (entry.key === null) {
      if (isRecord(value)) Object.assign(composed, value);
    } else {
      composed[entry.key] = value;
    }
  }

  const parsed = clusterConfigSchema.safeParse(composed);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues }, 'Canonical configuration violates output contract');
    throw new EngineInvariantError('Canonical configuration violates output contract', {
      issues: parsed.error.issues,
    });
  }

  return Success(parsed.data);
}
