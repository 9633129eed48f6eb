/**
 * Logger for the cluster configuration engine
 * Uses Pino for structured logging. Output goes to stderr so that stdout stays
 * free for canonical configuration output.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { config } from '@/config/index';

export type { Logger };

export interface LoggerConfig {
  /** Component name attached to every record */
  name?: string;
  level?: string;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(options: LoggerConfig = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: options.name ?? 'cluster-config',
    level: options.level ?? config.logging.level,
    base: {
      pid: process.pid,
      service: 'cluster-config-engine',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  return pino(loggerOptions, pino.destination(2));
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, context: Record<string, unknown>): Logger {
  return parent.child(context);
}
