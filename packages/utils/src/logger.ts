/**
 * Logger
 * 
 * Pino-based structured logger shared by every package.
 * Logs go to stderr so stdout stays free for command output.
 */

import pino from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino(
  {
    level: LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'pylayer',
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
  },
  NODE_ENV === 'development' ? undefined : pino.destination(2)
);

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

/**
 * Change the level of the root logger and every child created afterwards
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}
