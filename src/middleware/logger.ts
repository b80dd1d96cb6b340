import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { AppConfig } from '../config';

// pretty logs in dev, json in prod
export function loggerOptions(config: Pick<AppConfig, 'env' | 'logLevel'>): LoggerOptions {
  return {
    level: config.logLevel,
    transport:
      config.env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

export function createLogger(config: Pick<AppConfig, 'env' | 'logLevel'>): Logger {
  return pino(loggerOptions(config));
}
