/**
 * Node Pool Policy Checker
 *
 * Validates the node-pool map as one unit. The map is valid only when every
 * entry is valid, but every entry is checked so that each offending key is
 * reported, not just the first.
 *
 * The map key is the pool's identity; `name` is an ordinary attribute that
 * pools may share.
 */

import type { CollectionDefinition } from '@/config/registry';
import { Failure, Success, type Result } from '@/types/core';
import {
  diagnostic,
  isPlainObject,
  joinPath,
  type Diagnostic,
  type ValidationContext,
} from './core-types';
import { minCountNotAboveMax, type CrossFieldRule } from './cross-field-validator';
import { normalizeSection, type NormalizedSection } from './normalizer';
import { checkSection, describeShape } from './section-validator';

export type NodePoolMap = Readonly<Record<string, NormalizedSection>>;

/**
 * Rules applied to each pool after its field checks
 */
export const POOL_RULES: readonly CrossFieldRule[] = [minCountNotAboveMax];

interface PoolOutcome {
  readonly key: string;
  readonly diagnostics: Diagnostic[];
  readonly value: NormalizedSection | null;
}

function checkPool(
  key: string,
  raw: unknown,
  collection: CollectionDefinition,
  path: string,
  context: ValidationContext,
): PoolOutcome {
  const diagnostics: Diagnostic[] = [];

  if (collection.keyPattern && !new RegExp(collection.keyPattern.source).test(key)) {
    diagnostics.push(
      diagnostic('PatternMismatch', path, `Node pool key "${key}" is not a ${collection.keyPattern.label}`, {
        value: key,
        pattern: collection.keyPattern.source,
      }),
    );
  }

  const check = checkSection(raw, collection.entry, path, context);
  diagnostics.push(...check.diagnostics);
  if (check.present) {
    diagnostics.push(...POOL_RULES.flatMap((rule) => rule(check)));
  }

  if (diagnostics.length > 0) {
    return { key, diagnostics, value: null };
  }
  return { key, diagnostics, value: normalizeSection(check) };
}

/**
 * Validate and normalize the whole node-pool map.
 * Entries are visited, reported and emitted in key order.
 */
export function checkNodePools(
  raw: unknown,
  collection: CollectionDefinition,
  path: string,
  context: ValidationContext,
): Result<NodePoolMap, Diagnostic[]> {
  if (raw === undefined || raw === null) {
    return Success({});
  }
  if (!isPlainObject(raw)) {
    return Failure([
      diagnostic('TypeMismatch', path, `Expected map of node pools, received ${describeShape(raw)}`, {
        value: raw,
      }),
    ]);
  }

  const outcomes = Object.keys(raw)
    .sort()
    .map((key) => checkPool(key, raw[key], collection, joinPath(path, key), context));

  const diagnostics = outcomes.flatMap((outcome) => outcome.diagnostics);
  if (diagnostics.length > 0) {
    const offending = outcomes.filter((outcome) => outcome.diagnostics.length > 0).map((o) => o.key);
    context.logger.debug({ path, offending }, 'Node pool map rejected');
    return Failure(diagnostics);
  }

  const pools: Record<string, NormalizedSection> = {};
  for (const outcome of outcomes) {
    if (outcome.value) pools[outcome.key] = outcome.value;
  }
  return Success(pools);
}
