/**
 * Storefront Webhook Handler
 * Verifies order webhooks and turns their payloads into order events
 */

import crypto from 'crypto';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export const ORDER_TOPICS = ['orders/create', 'orders/paid'] as const;

export type OrderTopic = (typeof ORDER_TOPICS)[number];

export const SHOP_DOMAIN_SUFFIX = '.myshopify.com';

export interface OrderLineItem {
  sku: string;
  quantity: number;
  title: string;
}

export interface OrderEvent {
  orderId: string | null;
  orderName: string | null;
  lineItems: OrderLineItem[];
}

export interface WebhookValidationResult {
  valid: boolean;
  error?: string;
}

const lineItemSchema = z.object({
  sku: z.string().nullable().optional(),
  quantity: z.union([z.number(), z.string()]).nullable().optional(),
  title: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
});

const orderPayloadSchema = z.object({
  id: z.union([z.number(), z.string()]).nullable().optional(),
  name: z.string().nullable().optional(),
  line_items: z.array(lineItemSchema).optional(),
});

function toQuantity(value: number | string | null | undefined): number {
  const numeric = typeof value === 'string' ? Number(value) : value ?? 0;
  return Number.isFinite(numeric) ? Math.trunc(numeric) : 0;
}

// ============================================================================
// Webhook Handler Class
// ============================================================================

export class OrderWebhookHandler {
  private readonly webhookSecret?: string;

  constructor(webhookSecret?: string) {
    this.webhookSecret = webhookSecret;
  }

  /**
   * Base64 HMAC-SHA256 of the raw body
   */
  computeSignature(payload: string | Buffer): string {
    if (!this.webhookSecret) {
      throw new ValidationError('Webhook secret not configured');
    }
    return crypto.createHmac('sha256', this.webhookSecret).update(payload).digest('base64');
  }

  validateSignature(payload: string | Buffer, signature: string | undefined): WebhookValidationResult {
    if (!this.webhookSecret) {
      return { valid: false, error: 'Webhook secret not configured' };
    }
    if (!signature) {
      return { valid: false, error: 'Missing signature' };
    }

    try {
      const expected = Buffer.from(this.computeSignature(payload));
      const received = Buffer.from(signature);
      if (expected.length !== received.length || !crypto.timingSafeEqual(expected, received)) {
        return { valid: false, error: 'Invalid signature' };
      }
      return { valid: true };
    } catch (error) {
      return {
        valid: false,
        error: error instanceof Error ? error.message : 'Signature validation failed',
      };
    }
  }

  validateShopDomain(domain: string | undefined): WebhookValidationResult {
    if (!domain) {
      return { valid: false, error: 'Missing shop domain' };
    }
    if (!domain.toLowerCase().endsWith(SHOP_DOMAIN_SUFFIX)) {
      return { valid: false, error: `Invalid shop domain: ${domain}` };
    }
    return { valid: true };
  }

  isProcessableTopic(topic: string | undefined): topic is OrderTopic {
    return ORDER_TOPICS.some((allowed) => allowed === topic);
  }

  /**
   * Parse a raw order payload; ValidationError on bad JSON or shape
   */
  parseOrder(rawPayload: string | Buffer): OrderEvent {
    let json: unknown;
    try {
      json = JSON.parse(typeof rawPayload === 'string' ? rawPayload : rawPayload.toString('utf8'));
    } catch {
      throw new ValidationError('Invalid JSON payload');
    }

    const result = orderPayloadSchema.safeParse(json);
    if (!result.success) {
      throw new ValidationError('Invalid order payload', {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const order = result.data;
    return {
      orderId: order.id === null || order.id === undefined ? null : String(order.id),
      orderName: order.name ?? null,
      lineItems: (order.line_items ?? []).map((item) => ({
        sku: (item.sku ?? '').trim(),
        quantity: toQuantity(item.quantity),
        title: item.title ?? item.name ?? '',
      })),
    };
  }
}

export function createOrderWebhookHandler(webhookSecret?: string): OrderWebhookHandler {
  return new OrderWebhookHandler(webhookSecret);
}
