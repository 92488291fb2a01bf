/**
 * Structured logger (pino).
 *
 * Call sites use pino's `(context, message)` form:
 *   logger.info({ jobId }, 'Training job created');
 */

import { pino, type Logger as PinoLogger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = PinoLogger;

export interface LoggerConfig {
  level: LogLevel;
  service: string;
}

export function createLogger(config: LoggerConfig): Logger {
  return pino({
    level: config.level,
    base: { service: config.service },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
