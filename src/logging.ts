// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs;
//      under NODE_ENV=test it is silent unless LOG_LEVEL asks otherwise.

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

const env = process.env.NODE_ENV ?? 'development';
const isDev = env === 'development';

const baseOptions: LoggerOptions = {
  name: 'pdf-rag-core',
  level: process.env.LOG_LEVEL || (env === 'test' ? 'silent' : isDev ? 'debug' : 'info'),
};

function createLogger(): Logger {
  // Try pretty transport in development; fall back to standard if unavailable.
  if (isDev) {
    try {
      return pino({
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            singleLine: false,
          },
        },
      });
    } catch {
      return pino(baseOptions);
    }
  }
  return pino(baseOptions);
}

const logger = createLogger();

export default logger;
