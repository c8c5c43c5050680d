/**
 * Root logger factory.
 *
 * Components receive a pino Logger and derive a child with their
 * component name; only the entry point builds the root logger.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export interface CreateLoggerOptions {
  /** pino level name (default: PACKSYNC_LOG_LEVEL or 'info') */
  level?: string;

  /** Human-readable output through pino-pretty instead of JSON lines */
  pretty?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    name: 'packsync',
    level: options.level ?? process.env['PACKSYNC_LOG_LEVEL'] ?? 'info',
  };

  if (options.pretty) {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    };
  }

  return pino(loggerOptions);
}
