/**
 * Shared pino logger
 */

import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { LOG_LEVELS } from './config.js';

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Map a LOG_LEVEL value to a pino level; unknown names fall back to info
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const wanted = (raw || 'info').toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? 'info';
}

const logLevel = resolveLogLevel(process.env.LOG_LEVEL);

// When running locally log in a human-readable format and not JSON
const transport =
  process.env.LOG_PRETTY === 'true'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      }
    : undefined;

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'rewatch',
    level: logLevel,
    transport,
    ...options,
  });
}

export const logger: Logger = createLogger();
