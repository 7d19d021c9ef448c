/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import pino from 'pino';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

// An unknown LOG_LEVEL falls back to info; callers validate it and apply it with setLogLevel.
export function resolveLogLevel(value: string | undefined): string {
  if (value === undefined) {
    return 'info';
  }
  return value === 'silent' || value in pino.levels.values ? value : 'info';
}

const LOG_LEVEL = resolveLogLevel(process.env['LOG_LEVEL']);

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'metadata-check',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      destination: 2,
    },
  } : undefined,
}, NODE_ENV === 'development' ? undefined : pino.destination(2));

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Change the level of the shared logger (e.g. from a CLI flag)
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
