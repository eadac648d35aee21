import pino from 'pino';
import type { LoggerOptions } from 'pino';

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  name?: string;
}

function prettyByDefault(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test';
}

/** pino options shared by module loggers and the HTTP server's logger. */
export function loggerOptions(config: LoggerConfig = {}): LoggerOptions {
  const { level = process.env.LOG_LEVEL || 'info', pretty = prettyByDefault(), name } = config;

  return {
    level,
    name,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    }),
  };
}

export function createLogger(config: LoggerConfig = {}) {
  return pino(loggerOptions(config));
}

export type Logger = ReturnType<typeof createLogger>;
