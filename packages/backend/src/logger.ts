/**
 * Logger settings shared by the HTTP server and the sync engine
 */

import pino, { type Logger } from 'pino';
import type { AppConfig } from './config/index.js';

export interface LoggerSettings {
  level: string;
  transport?: {
    target: string;
    options: Record<string, unknown>;
  };
}

export function loggerSettings(config: Pick<AppConfig, 'env' | 'logLevel'>): LoggerSettings {
  return {
    level: config.logLevel,
    transport:
      config.env === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
            },
          }
        : undefined,
  };
}

export function createLogger(config: Pick<AppConfig, 'env' | 'logLevel'>): Logger {
  return pino(loggerSettings(config));
}
