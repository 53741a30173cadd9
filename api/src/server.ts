/**
 * Server Entry Point
 * @module server
 */

import { buildApp, createAppServices } from './app.js';
import { initConfig } from './config/index.js';
import { getLogger, initLogger } from './logging/index.js';

/**
 * Start the server
 */
async function start(): Promise<void> {
  const config = await initConfig();
  const logger = initLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    version: config.version,
    environment: config.env,
  });

  if (!config.dashboard.apiKey) {
    logger.warn('MK_CSM_KEY is not set; dashboard requests will be rejected');
  }

  const app = await buildApp({
    services: createAppServices(config),
    logger: { level: config.logging.level },
    corsOrigin: config.server.corsOrigin,
    bodyLimit: config.server.bodyLimit,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await app.close();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ host: config.server.host, port: config.server.port });
  logger.info(
    { host: config.server.host, port: config.server.port },
    `Server listening on http://${config.server.host}:${config.server.port}`
  );
}

start().catch((error: unknown) => {
  getLogger().fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
