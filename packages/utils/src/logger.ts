/**
 * Logger
 * 
 * Pino-based structured logger shared by every package.
 * Errors are logged under `err`; sessions add their `sessionId`.
 */

import pino from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
  base: {
    service: 'mediaconv',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = typeof logger;

export interface LogContext {
  component?: string;
  sessionId?: string;
  [key: string]: unknown;
}

/**
 * Create a child logger with additional context
 */
export function createLogger(context: LogContext): Logger {
  return logger.child(context);
}
