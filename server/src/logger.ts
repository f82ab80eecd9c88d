/**
 * Structured logging with Pino
 *
 * Provides a centralized logger instance with appropriate configuration
 * for development, test and production environments.
 */

import pino from 'pino';

const env = process.env.NODE_ENV;
const isDevelopment = env !== 'production' && env !== 'test';

function defaultLevel(): string {
  if (env === 'test') return 'silent';
  return isDevelopment ? 'debug' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),

  // Use pino-pretty in development for human-readable logs
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,

  // Redact credentials from logs
  redact: {
    paths: [
      'token',
      'botToken',
      'signingSecret',
      'secret',
      'accessKeyId',
      'secretAccessKey',
      'password',
      'connectionString',
      'authorization',
      'req.headers.authorization',
      'req.headers["x-slack-signature"]',
    ],
    censor: '[REDACTED]',
  },

  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

/**
 * Create a child logger with specific context
 */
export function createLogger(context: string | Record<string, unknown>) {
  const bindings = typeof context === 'string' ? { module: context } : context;
  return logger.child(bindings);
}

