/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { bootstrap } from './infra/bootstrap.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  const { config, logger, deps } = bootstrap(process.env, 'adops-sheets-server');

  logger.info({ config: { server: config.server } }, 'Starting API server');

  // Fastify logs through the same pino instance
  const app = await buildApp({
    fastifyOptions: {
      loggerInstance: logger,
      disableRequestLogging: false,
    },
    deps,
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
