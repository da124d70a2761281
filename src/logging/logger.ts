/**
 * Logging for the client and the bundled middleware.
 *
 * Uses pino for structured logging. The level comes from the `level` option,
 * then the LOG_LEVEL environment variable, and is `silent` otherwise so the
 * library stays quiet unless asked.
 */

import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import { z } from 'zod';

export type { Logger } from 'pino';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function resolveLogLevel(value: string | undefined): LogLevel | undefined {
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : undefined;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel(process.env.LOG_LEVEL) ?? 'silent';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'layered-http',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

let defaultLogger: Logger | undefined;

/**
 * Shared logger used when a client or middleware is not given one.
 */
export function getDefaultLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}
