import { pino } from 'pino';
import type { Logger } from 'pino';

/**
 * Process logger for the batch CLI. The HTTP server uses Fastify's own.
 * `level` must already be a valid pino level; `loadConfig` normalizes LOG_LEVEL.
 */
export function createLogger(level: string = 'info'): Logger {
  return pino({ level });
}
