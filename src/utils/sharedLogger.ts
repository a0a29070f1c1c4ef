import pino from 'pino';

/**
 * Process-wide logger for services, tasks and scripts.
 * HTTP request logs go through Fastify's own pino instance.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: { service: process.env.SERVICE_NAME || 'release-archiver' },
  enabled: process.env.NODE_ENV !== 'test',
  redact: {
    paths: ['accessToken', 'token', '*.accessToken', '*.token', 'headers.authorization'],
    censor: '[REDACTED]',
  },
});

export type Logger = typeof logger;
