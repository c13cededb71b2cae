import pino, { type LoggerOptions } from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

/**
 * Shared by Fastify's request logger and the startup logger.
 * The API key header must never reach the log output.
 */
export const loggerOptions: LoggerOptions = {
  level: LOG_LEVEL,
  redact: {
    paths: ['req.headers["x-api-key"]', 'headers["x-api-key"]'],
    censor: '[redacted]',
  },
};

/** Logger for code that runs before the HTTP server exists */
export const startupLogger = pino(loggerOptions);
