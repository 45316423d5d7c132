// src/logging.ts
// What: Application logger.
// How: Creates a pino logger. In development, attempts to use pino-pretty transport for readable logs.
//      Test runs stay silent unless LOG_LEVEL asks otherwise.

import pino, { type Logger, type LoggerOptions } from 'pino';

const env = process.env.NODE_ENV;
const isDev = env !== 'production' && env !== 'test';
const defaultLevel = env === 'test' ? 'silent' : isDev ? 'debug' : 'info';

const baseOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL || defaultLevel,
  base: { service: 'spot-recommender' },
};

function createLogger(): Logger {
  if (!isDev) return pino(baseOptions);
  // Try pretty transport in development; fall back to standard if unavailable.
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

const logger: Logger = createLogger();

export default logger;
