/**
 * Application Entry Point - Validation Engine
 */

export {
  createClusterConfigEngine,
  validateClusterConfig,
  loadAndValidate,
  resolveSection,
  type ClusterConfigEngine,
  type EngineOptions,
  type ValidationFailure,
  type ValidationResult,
} from './engine';
export { assembleClusterConfig, type SectionEntry } from './assembler';
export { clusterConfigSchema } from './canonical-schema';
