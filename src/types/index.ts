/**
 * Core type definitions for the cluster configuration engine.
 * Provides the Result type and the diagnostic model shared by every validator.
 */

export * from './core';

/**
 * Diagnostic model
 *
 * @remarks
 * Every validator reports problems as `Diagnostic` records:
 * - `path`: dotted field path, e.g. `node_pools.workload.min_count`
 * - `kind`: one of the `DiagnosticKind` values
 * - `message`: human-readable explanation
 *
 * @public
 */
export type { Diagnostic, DiagnosticKind, DiagnosticRange } from '@/validation/core-types';

/**
 * Canonical configuration types produced on success
 *
 * @public
 */
export type {
  ClusterConfig,
  NetworkConfig,
  DefaultNodePoolConfig,
  NodePoolConfig,
  MaintenanceWindow,
  BlackoutPeriod,
  LockConfig,
  ManagedIdentityConfig,
  AcrConfig,
  MonitorMetricsConfig,
  IngressProfile,
  SafeguardProfile,
} from '@/app/canonical-schema';
