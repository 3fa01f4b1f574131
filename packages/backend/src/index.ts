/**
 * Server entry: webhook listener plus the nightly reconciliation schedule
 */

import { errorMessage } from '@stockbridge/integrations';
import { getConfig } from './config/index.js';
import { createServices } from './container.js';
import { buildApp } from './app.js';

async function start(): Promise<void> {
  const config = getConfig();
  const services = createServices(config);
  const { logger, engine } = services;

  const app = await buildApp({
    config,
    webhookHandler: services.webhookHandler,
    processOrder: (order) => engine.processOrder(order),
  });

  // Graceful shutdown handler
  let shuttingDown = false;
  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
      // Close HTTP server, waiting for accepted orders
      await app.close();
      logger.info('HTTP server closed');

      await engine.stop();
      logger.info('Sync engine stopped');

      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error during shutdown');
      process.exit(1);
    }
  }

  const address = await app.listen({
    port: config.server.port,
    host: config.server.host,
  });

  await engine.start();

  logger.info(`StockBridge sync service running at ${address}`);
  logger.info(`Environment: ${config.env}`);

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', errorMessage(error));
  process.exit(1);
});
