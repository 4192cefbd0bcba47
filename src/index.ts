import { loadConfig } from './infrastructure/index.js';
import { buildServer } from './interfaces/http/index.js';

/**
 * Bootstrap the HTTP normalization service.
 *
 * Order:
 * 1) Configuration (env)
 * 2) Fastify app + routes
 * 3) Shutdown hooks
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer(config);

  const shutdown = (signal: NodeJS.Signals): void => {
    fastify.log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  fastify.log.info(
    { inventory: config.inventory, clock: config.clock },
    'Normalization service ready',
  );
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
