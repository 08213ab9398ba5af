/**
 * Logging configuration using Pino.
 */

import pino from 'pino';
import type { LoggerOptions } from 'pino';
import { config } from '../config.js';

const pretty =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

/**
 * Pino options shared by the application logger and Fastify's request logger.
 */
export const loggerConfig: LoggerOptions = {
  level: config.LOG_LEVEL.toLowerCase(),
  transport: pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
};

/**
 * Global logger instance configured with environment settings.
 */
export const logger = pino(loggerConfig);
