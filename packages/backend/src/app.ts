/**
 * HTTP application: health, banner and order webhooks
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { OrderEvent, OrderWebhookHandler } from '@stockbridge/integrations';
import type { OrderOutcome } from '@stockbridge/sync-engine';
import type { AppConfig } from './config/index.js';
import { loggerSettings } from './logger.js';
import { healthRoutes } from './routes/health.js';
import { webhookRoutes } from './routes/webhooks.js';

export const SERVICE_NAME = 'StockBridge';
export const SERVICE_VERSION = '1.0.0';

export interface BuildAppOptions {
  config: AppConfig;
  webhookHandler: OrderWebhookHandler;
  processOrder: (order: OrderEvent) => Promise<OrderOutcome>;
  /** false silences request logging */
  logger?: boolean;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;
  const app = Fastify({
    logger: options.logger === false ? false : loggerSettings(config),
  });

  await app.register(healthRoutes, { prefix: '/health', environment: config.env });
  await app.register(webhookRoutes, {
    prefix: '/webhooks',
    handler: options.webhookHandler,
    processOrder: options.processOrder,
    validateSignature: config.storefront.validateSignature,
    testEndpoint: config.env !== 'production',
  });

  // Root route
  app.get('/', async () => {
    return {
      name: `${SERVICE_NAME} Sync Service`,
      version: SERVICE_VERSION,
      status: 'running',
      endpoints: {
        health: '/health',
        orders: '/webhooks/orders',
      },
    };
  });

  // Global error handler
  app.setErrorHandler((error, _request, reply) => {
    app.log.error(error);

    if (error.validation) {
      return reply.code(400).send({
        success: false,
        error: 'Validation Error',
        message: error.message,
      });
    }

    const statusCode = error.statusCode ?? 500;
    return reply.code(statusCode).send({
      success: false,
      error: error.name || 'Internal Server Error',
      message: config.env === 'production' ? 'An error occurred' : error.message,
    });
  });

  return app;
}
