import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export const VALID_LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Logger options shared by the Fastify instance and the standalone logger.
 * Pretty-printed in development, JSON everywhere else.
 */
export function createLoggerOptions(level: string, environment: string): LoggerOptions {
  return {
    level,
    transport: environment === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname'
      }
    } : undefined
  };
}

export function createLogger(level: string, environment: string): Logger {
  return pino(createLoggerOptions(level, environment));
}

function defaultLevel(environment: string): string {
  const level = process.env.LOG_LEVEL;
  if (level && VALID_LOG_LEVELS.includes(level)) {
    return level;
  }
  return environment === 'test' ? 'silent' : 'info';
}

const environment = process.env.NODE_ENV || 'development';

export const logger = createLogger(defaultLevel(environment), environment);
