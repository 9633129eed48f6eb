/**
 * Runtime configuration
 *
 * Read once from the environment and validated with zod. Invalid values fall
 * back to defaults rather than aborting, since the engine itself has no
 * required settings.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { environmentSchema, logLevelSchema, LIMITS } from './constants';

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.catch('info').default('info'),
  NODE_ENV: environmentSchema.catch('production').default('production'),
  CLUSTER_CONFIG_MAX_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .catch(LIMITS.MAX_DOCUMENT_SIZE)
    .default(LIMITS.MAX_DOCUMENT_SIZE),
});

export interface AppConfig {
  readonly environment: z.infer<typeof environmentSchema>;
  readonly logging: { readonly level: z.infer<typeof logLevelSchema> };
  readonly document: { readonly maxBytes: number };
}

/**
 * Build the configuration from an environment map
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    environment: parsed.NODE_ENV,
    logging: { level: parsed.LOG_LEVEL },
    document: { maxBytes: parsed.CLUSTER_CONFIG_MAX_BYTES },
  };
}

export const config: AppConfig = loadConfig();

/**
 * Log the effective configuration when running in development
 */
export function logConfigSummaryIfDev(logger: Logger, current: AppConfig = config): void {
  if (current.environment !== 'development') return;

  logger.debug(
    {
      environment: current.environment,
      logLevel: current.logging.level,
      maxDocumentBytes: current.document.maxBytes,
    },
    'Configuration loaded',
  );
}
