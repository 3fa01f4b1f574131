/**
 * Order Webhook Receiver
 * Verifies storefront order webhooks and hands the order to the sync engine
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  ValidationError,
  errorMessage,
  type OrderEvent,
  type OrderWebhookHandler,
} from '@stockbridge/integrations';
import type { OrderOutcome } from '@stockbridge/sync-engine';

export const HMAC_HEADER = 'x-shopify-hmac-sha256';
export const SHOP_DOMAIN_HEADER = 'x-shopify-shop-domain';
export const TOPIC_HEADER = 'x-shopify-topic';

export interface WebhookRouteOptions {
  handler: OrderWebhookHandler;
  processOrder: (order: OrderEvent) => Promise<OrderOutcome>;
  validateSignature: boolean;
  /** Register the unsigned echo endpoint */
  testEndpoint: boolean;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function rawBody(request: FastifyRequest): Buffer {
  if (Buffer.isBuffer(request.body)) {
    return request.body;
  }
  return Buffer.from(typeof request.body === 'string' ? request.body : '');
}

function reject(reply: FastifyReply, statusCode: number, error: string) {
  return reply.code(statusCode).send({ error, statusCode });
}

export async function webhookRoutes(app: FastifyInstance, opts: WebhookRouteOptions): Promise<void> {
  const pending = new Set<Promise<void>>();

  // Signatures are computed over the exact bytes received
  app.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.addHook('onClose', async () => {
    await Promise.allSettled(pending);
  });

  if (!opts.validateSignature) {
    app.log.warn('Webhook signature validation is disabled');
  }

  // POST /webhooks/orders - orders/create and orders/paid
  app.post('/orders', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = rawBody(request);
    const topic = headerValue(request.headers[TOPIC_HEADER]);

    if (opts.validateSignature) {
      const signature = opts.handler.validateSignature(body, headerValue(request.headers[HMAC_HEADER]));
      if (!signature.valid) {
        request.log.warn({ error: signature.error }, 'Rejected webhook signature');
        return reject(reply, 401, signature.error ?? 'Invalid signature');
      }

      const shop = opts.handler.validateShopDomain(headerValue(request.headers[SHOP_DOMAIN_HEADER]));
      if (!shop.valid) {
        request.log.warn({ error: shop.error }, 'Rejected webhook shop domain');
        return reject(reply, 401, shop.error ?? 'Invalid shop domain');
      }
    }

    if (!opts.handler.isProcessableTopic(topic)) {
      request.log.info({ topic }, 'Ignoring webhook topic');
      return reply.code(200).send({ status: 'ignored', topic: topic ?? null });
    }

    let order: OrderEvent;
    try {
      order = opts.handler.parseOrder(body);
    } catch (error) {
      if (error instanceof ValidationError) {
        return reject(reply, 400, error.message);
      }
      throw error;
    }

    const task = opts.processOrder(order).then(
      (outcome) => {
        request.log.info(
          {
            orderId: outcome.orderId,
            processed: outcome.itemsProcessed,
            skipped: outcome.itemsSkipped,
            errors: outcome.errors.length,
          },
          'Order processed'
        );
      },
      (error: unknown) => {
        request.log.error({ orderId: order.orderId, error: errorMessage(error) }, 'Order processing failed');
      }
    );
    pending.add(task);
    void task.finally(() => pending.delete(task));

    return reply.code(200).send({ status: 'accepted', orderId: order.orderId, orderName: order.orderName });
  });

  if (opts.testEndpoint) {
    // POST /webhooks/test - echoes a JSON payload, never registered in production
    app.post('/test', async (request: FastifyRequest, reply: FastifyReply) => {
      let data: unknown;
      try {
        data = JSON.parse(rawBody(request).toString('utf8'));
      } catch (error) {
        return reject(reply, 400, `Invalid JSON: ${errorMessage(error)}`);
      }

      request.log.info({ data }, 'Test webhook received');
      return reply.code(200).send({ status: 'test_success', message: 'Test webhook received', data });
    });
  }
}
