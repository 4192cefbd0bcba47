import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AppConfig } from '../../application/index.js';
import normalizeRoutes from './normalize-routes.js';

/**
 * Builds the Fastify app without listening, so tests can drive it
 * through `inject()`.
 */
export async function buildServer(
  config: Pick<AppConfig, 'inventory' | 'clock' | 'logLevel'>,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  await fastify.register(normalizeRoutes, {
    inventory: config.inventory,
    clock: config.clock,
  });

  return fastify;
}
