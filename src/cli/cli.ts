#!/usr/bin/env node
/**
 * Cluster configuration CLI
 * Command-line interface for validating cluster configuration documents
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { createClusterConfigEngine } from '@/app/engine';
import { LOG_LEVELS } from '@/config/constants';
import { config, loadConfig, logConfigSummaryIfDev } from '@/config/index';
import { DOCUMENT_FORMATS, type DocumentFormat } from '@/lib/document';
import { createChildLogger, createLogger } from '@/lib/logger';
import { runSchemaCommand, runValidateCommand, type CommandIO } from './commands';

// src/cli/ and dist/cli/ are both two levels below the package root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf-8')));

interface GlobalOptions {
  logLevel: string;
  dev?: boolean;
}

interface ValidateOptions {
  format?: DocumentFormat;
  output?: string;
  json?: boolean;
}

const io: CommandIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

const program = new Command();

program
  .name('cluster-config')
  .description('Validate and normalize managed Kubernetes cluster configuration documents')
  .version(packageJson.version)
  .addOption(
    new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS).default(config.logging.level),
  )
  .option('--dev', 'development mode: log the effective configuration, show stack traces')
  .addHelpText(
    'after',
    `

Examples:
  $ cluster-config validate cluster.yaml                  Validate and print the canonical configuration
  $ cluster-config validate cluster.json --json           Report diagnostics as JSON
  $ cluster-config validate cluster.yaml -o resolved.json Write the canonical configuration to a file
  $ cluster-config schema maintenance_window_node_os      Show the rules of one section

Exit codes:
  0  configuration is valid
  1  one or more validation diagnostics
  2  document could not be read or decoded
  3  internal failure, e.g. the output file could not be written

Environment Variables:
  LOG_LEVEL                  Logging level (trace, debug, info, warn, error, fatal, silent)
  NODE_ENV                   development enables --dev behaviour (default: production)
  CLUSTER_CONFIG_MAX_BYTES   Largest accepted document in bytes (default: 1048576)
`,
  );

program
  .command('validate')
  .description('validate a configuration document (JSON or YAML)')
  .argument('<file>', 'configuration document')
  .addOption(new Option('--format <format>', 'document format (default: from extension)').choices(DOCUMENT_FORMATS))
  .option('-o, --output <file>', 'write the canonical configuration to a file')
  .option('--json', 'print diagnostics as JSON')
  .action((file: string, options: ValidateOptions) => {
    const globals = program.opts<GlobalOptions>();
    const effective = globals.dev ? loadConfig({ ...process.env, NODE_ENV: 'development' }) : config;
    const logger = createChildLogger(createLogger({ name: 'cli', level: globals.logLevel }), {
      command: 'validate',
      file,
    });

    // Log configuration summary in development mode
    logConfigSummaryIfDev(logger, effective);

    const engine = createClusterConfigEngine({ logger, maxBytes: effective.document.maxBytes });
    process.exitCode = runValidateCommand(
      file,
      { ...options, dev: effective.environment === 'development' },
      engine,
      io,
      logger,
    );
  });

program
  .command('schema')
  .description('print the field registry, or one section of it, as JSON')
  .argument('[section]', 'dotted section name, e.g. ingress_profile.nginx or node_pools')
  .action((section: string | undefined) => {
    process.exitCode = runSchemaCommand(section, io);
  });

program.parse(process.argv);
