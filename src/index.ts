/**
 * Cluster configuration engine
 * Validates and normalizes managed Kubernetes cluster configuration documents.
 */

/**
 * Creates an engine bound to a logger and document limits.
 *
 * @example
 * ```typescript
 * import { createClusterConfigEngine } from 'cluster-config-engine';
 *
 * const engine = createClusterConfigEngine();
 * const result = engine.validateFile('./cluster.yaml');
 * if (result.ok) {
 *   provision(result.value);
 * } else if (result.error.type === 'invalid') {
 *   for (const d of result.error.diagnostics) console.error(`${d.path}: ${d.message}`);
 * }
 * ```
 *
 * @public
 */
export { createClusterConfigEngine } from './app/index';

/**
 * One-shot helpers using a shared default engine.
 *
 * @public
 */
export { validateClusterConfig, loadAndValidate } from './app/index';

export type {
  ClusterConfigEngine,
  EngineOptions,
  ValidationFailure,
  ValidationResult,
} from './app/index';

/**
 * Canonical output contract (zod) and the types inferred from it.
 *
 * @public
 */
export { clusterConfigSchema } from './app/index';

/**
 * Schema Registry, exported for auditing and documentation tooling.
 *
 * @public
 */
export { CLUSTER_SCHEMA } from './config/registry';
export type {
  FieldDefinition,
  FieldType,
  SectionDefinition,
  CollectionDefinition,
} from './config/registry';

/**
 * Document decoding.
 *
 * @public
 */
export { parseClusterDocument, readClusterDocument, detectFormat } from './lib/document';
export type { DocumentFormat } from './lib/document';

export { StructuralError, EngineInvariantError, ErrorCodes } from './lib/errors';

export { DIAGNOSTIC_KINDS } from './validation/core-types';

export * from './types/index';
