/**
 * Validation Engine
 *
 * Runs the pipeline over one input document:
 *   structural check → field checks → section rules / maintenance windows /
 *   node pools → normalization → assembly
 *
 * Pure and synchronous; the only shared state is the read-only registry.
 */

import type { Logger } from 'pino';
import { CLUSTER_SCHEMA, type SectionDefinition } from '@/config/registry';
import {
  readClusterDocument,
  parseClusterDocument,
  type DocumentFormat,
  type DocumentOptions,
} from '@/lib/document';
import { ErrorCodes, StructuralError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { Failure, Success, type Result } from '@/types/core';
import {
  isPlainObject,
  joinPath,
  type Diagnostic,
  type SectionOutcome,
  type ValidationContext,
} from '@/validation/core-types';
import { checkCrossFields } from '@/validation/cross-field-validator';
import { resolveMaintenanceWindow } from '@/validation/maintenance-window';
import { checkNodePools } from '@/validation/node-pool-checker';
import { normalizeFields, normalizeSection } from '@/validation/normalizer';
import { checkSection } from '@/validation/section-validator';
import { assembleClusterConfig, type SectionEntry } from './assembler';
import type { ClusterConfig } from './canonical-schema';

export type ValidationFailure =
  | { readonly type: 'structural'; readonly error: StructuralError }
  | { readonly type: 'invalid'; readonly diagnostics: readonly Diagnostic[] };

export type ValidationResult = Result<ClusterConfig, ValidationFailure>;

export interface EngineOptions {
  logger?: Logger;
  /** Document size limit for text and file input */
  maxBytes?: number;
}

export interface ClusterConfigEngine {
  /** Validate an already-decoded document */
  validate(input: unknown): ValidationResult;
  /** Decode and validate document text */
  validateText(text: string, format: DocumentFormat): ValidationResult;
  /** Read, decode and validate a document file */
  validateFile(path: string, format?: DocumentFormat): ValidationResult;
  /** The registry the engine validates against */
  readonly schema: SectionDefinition;
}

type SectionResolver = (
  raw: unknown,
  def: SectionDefinition,
  path: string,
  context: ValidationContext,
) => SectionOutcome;

/**
 * Field checks, then section rules, then defaults
 */
export const resolveSection: SectionResolver = (raw, def, path, context) => {
  const check = checkSection(raw, def, path, context);
  const diagnostics = [...check.diagnostics, ...checkCrossFields(check)];
  if (diagnostics.length > 0) return Failure(diagnostics);
  return Success(normalizeSection(check));
};

/**
 * Sections that need a specialized resolver instead of the generic one
 */
const SECTION_RESOLVERS: Readonly<Record<string, SectionResolver>> = {
  maintenance_window_auto_upgrade: resolveMaintenanceWindow,
  maintenance_window_node_os: resolveMaintenanceWindow,
};

function structuralFailure(error: StructuralError): ValidationResult {
  const failure: ValidationFailure = { type: 'structural', error };
  return Failure(failure);
}

function invalidFailure(diagnostics: readonly Diagnostic[]): ValidationResult {
  const failure: ValidationFailure = { type: 'invalid', diagnostics };
  return Failure(failure);
}

function runPipeline(input: Record<string, unknown>, context: ValidationContext): ValidationResult {
  const entries: SectionEntry[] = [];

  const root = checkSection(input, CLUSTER_SCHEMA, '', context, { nested: false });
  entries.push({
    key: null,
    outcome:
      root.diagnostics.length > 0 ? Failure([...root.diagnostics]) : Success(normalizeFields(root)),
  });

  for (const [key, def] of Object.entries(CLUSTER_SCHEMA.sections ?? {})) {
    const resolve = SECTION_RESOLVERS[key] ?? resolveSection;
    entries.push({ key, outcome: resolve(input[key], def, joinPath('', key), context) });
  }

  for (const [key, collection] of Object.entries(CLUSTER_SCHEMA.collections ?? {})) {
    entries.push({ key, outcome: checkNodePools(input[key], collection, key, context) });
  }

  const assembled = assembleClusterConfig(entries, context.logger);
  if (!assembled.ok) {
    context.logger.info({ diagnostics: assembled.error.length }, 'Cluster configuration rejected');
    return invalidFailure(assembled.error);
  }

  context.logger.debug({ name: assembled.value.name }, 'Cluster configuration accepted');
  return Success(assembled.value);
}

/**
 * Create an engine bound to a logger and document limits
 */
export function createClusterConfigEngine(options: EngineOptions = {}): ClusterConfigEngine {
  const logger = options.logger ?? createLogger({ name: 'cluster-config-engine' });
  const documentOptions: DocumentOptions =
    options.maxBytes === undefined ? {} : { maxBytes: options.maxBytes };

  function validate(input: unknown): ValidationResult {
    if (!isPlainObject(input)) {
      return structuralFailure(
        new StructuralError(
          'Configuration document must be a mapping at the top level',
          ErrorCodes.DOCUMENT_SHAPE,
          { received: Array.isArray(input) ? 'array' : input === null ? 'null' : typeof input },
        ),
      );
    }

    logger.debug({ fields: Object.keys(input).length }, 'Validating cluster configuration');
    return runPipeline(input, { logger });
  }

  return {
    schema: CLUSTER_SCHEMA,

    validate,

    validateText(text, format) {
      const parsed = parseClusterDocument(text, format, documentOptions);
      return parsed.ok ? validate(parsed.value) : structuralFailure(parsed.error);
    },

    validateFile(path, format) {
      const parsed = readClusterDocument(path, format, documentOptions);
      if (!parsed.ok) {
        logger.warn({ path, code: parsed.error.code }, 'Configuration document could not be loaded');
        return structuralFailure(parsed.error);
      }
      return validate(parsed.value);
    },
  };
}

let defaultEngine: ClusterConfigEngine | null = null;

function getDefaultEngine(): ClusterConfigEngine {
  if (!defaultEngine) {
    defaultEngine = createClusterConfigEngine();
  }
  return defaultEngine;
}

/**
 * Validate a decoded document with the default engine
 */
export function validateClusterConfig(input: unknown, options?: EngineOptions): ValidationResult {
  const engine = options ? createClusterConfigEngine(options) : getDefaultEngine();
  return engine.validate(input);
}

/**
 * Read, decode and validate a document file with the default engine
 */
export function loadAndValidate(path: string, options?: EngineOptions): ValidationResult {
  const engine = options ? createClusterConfigEngine(options) : getDefaultEngine();
  return engine.validateFile(path);
}
