import pino from 'pino';

/**
 * Structured application logger
 *
 * Shared by the service layer, the cache and the HTTP server so every log
 * line carries the same base fields.
 */
export const logger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'macro-dashboard' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
