/**
 * Structured logging utility using pino
 *
 * Provides consistent logging across the application with:
 * - Environment-based log levels
 * - Structured JSON logging for production
 * - Pretty printing for development
 * - Component-based context
 */

import pino from 'pino';
import { sanitizeForLogging } from './sanitize.js';
import { config } from '../config/index.js';

// Detect test environment and suppress logs to keep test output clean
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

/**
 * Pino serializer that sanitizes sensitive data
 */
const sanitizingSerializer = (obj: unknown) => sanitizeForLogging(obj);

/**
 * Common pino options with security redaction
 */
const pinoOptions: pino.LoggerOptions = {
  level: config.logging.debug ? 'debug' : config.logging.level,
  enabled: !isTest,
  redact: {
    paths: [
      'apiKey',
      'api_key',
      'token',
      'secret',
      'password',
      'authorization',
      'Authorization',
      '*.apiKey',
      '*.api_key',
      '*.token',
      '*.secret',
      '*.password',
    ],
    censor: '***REDACTED***',
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: sanitizingSerializer,
  },
};

// Logs go to stderr so `ask --json` output on stdout stays machine-readable
export const logger =
  config.runtime.nodeEnv === 'production' || isTest
    ? pino(pinoOptions, pino.destination({ dest: 2, sync: false }))
    : pino({
        ...pinoOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss.l',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      });

/**
 * Create a child logger with component context
 *
 * @param component - Component name (e.g., 'rag', 'router', 'aggregator')
 */
export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export type Logger = pino.Logger;
