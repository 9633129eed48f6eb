/**
 * CLI command implementations
 *
 * Each command writes through an injected IO pair and returns the exit code,
 * leaving process handling to `cli.ts`.
 */

import { writeFileSync } from 'node:fs';
import type { ClusterConfigEngine } from '@/app/engine';
import { EXIT_CODES, type ExitCode } from '@/config/constants';
import { CLUSTER_SCHEMA, type SectionDefinition } from '@/config/registry';
import type { DocumentFormat } from '@/lib/document';
import { extractErrorMessage } from '@/lib/errors';
import type { Logger } from '@/lib/logger';
import { formatDiagnostics } from './format';
import {
  guidanceForDiagnostics,
  guidanceForStructuralError,
  provideContextualGuidance,
} from './guidance';

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface ValidateCommandOptions {
  format?: DocumentFormat;
  /** Write the canonical configuration to this file instead of stdout */
  output?: string;
  /** Emit diagnostics as JSON on stdout */
  json?: boolean;
  /** Print stack traces for internal failures */
  dev?: boolean;
}

function writeHints(hints: readonly string[], io: CommandIO): void {
  if (hints.length === 0) return;
  io.stderr('');
  io.stderr('Next steps:');
  hints.forEach((hint) => io.stderr(`  • ${hint}`));
}

/**
 * `validate <file>`: exit 0 valid, 1 diagnostics, 2 structural failure,
 * 3 internal failure (output not writable, broken engine invariant)
 */
export function runValidateCommand(
  file: string,
  options: ValidateCommandOptions,
  engine: ClusterConfigEngine,
  io: CommandIO,
  logger?: Logger,
): ExitCode {
  try {
    return validateAndReport(file, options, engine, io);
  } catch (error) {
    logger?.error({ error: extractErrorMessage(error) }, 'Validation aborted');
    const cause = error instanceof Error ? error : new Error(extractErrorMessage(error));
    provideContextualGuidance(cause, io.stderr, { dev: options.dev === true });
    return EXIT_CODES.INTERNAL;
  }
}

function validateAndReport(
  file: string,
  options: ValidateCommandOptions,
  engine: ClusterConfigEngine,
  io: CommandIO,
): ExitCode {
  const result = engine.validateFile(file, options.format);

  if (result.ok) {
    const canonical = JSON.stringify(result.value, null, 2);
    if (options.output) {
      writeFileSync(options.output, `${canonical}\n`, 'utf-8');
      io.stderr(`✓ ${file} is valid; canonical configuration written to ${options.output}`);
    } else {
      io.stdout(canonical);
    }
    return EXIT_CODES.VALID;
  }

  const failure = result.error;
  if (failure.type === 'structural') {
    if (options.json) {
      io.stdout(JSON.stringify({ valid: false, error: failure.error.toJSON() }, null, 2));
    } else {
      io.stderr(`✗ ${failure.error.message}`);
      writeHints(guidanceForStructuralError(failure.error.code), io);
    }
    return EXIT_CODES.STRUCTURAL;
  }

  if (options.json) {
    io.stdout(JSON.stringify({ valid: false, diagnostics: failure.diagnostics }, null, 2));
  } else {
    formatDiagnostics(failure.diagnostics, file).forEach((line) => io.stderr(line));
    writeHints(guidanceForDiagnostics(failure.diagnostics), io);
  }
  return EXIT_CODES.INVALID;
}

/**
 * Look up a section of the registry by its dotted name.
 * Collections resolve to their entry definition.
 */
export function findSection(name: string, root: SectionDefinition = CLUSTER_SCHEMA): SectionDefinition | null {
  let current: SectionDefinition | null = root;
  for (const segment of name.split('.')) {
    if (!current) return null;
    current = current.sections?.[segment] ?? current.collections?.[segment]?.entry ?? null;
  }
  return current;
}

/**
 * `schema [section]`: print the registry, or one section of it, as JSON
 */
export function runSchemaCommand(section: string | undefined, io: CommandIO): ExitCode {
  const definition = section ? findSection(section) : CLUSTER_SCHEMA;
  if (!definition) {
    io.stderr(`✗ Unknown section: ${section ?? ''}`);
    io.stderr(`Known sections: ${Object.keys(CLUSTER_SCHEMA.sections ?? {}).join(', ')}, node_pools`);
    return EXIT_CODES.INVALID;
  }
  io.stdout(JSON.stringify(definition, null, 2));
  return EXIT_CODES.VALID;
}
