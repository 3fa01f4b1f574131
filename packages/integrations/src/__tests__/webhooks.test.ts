/**
 * Order Webhook Handler Tests
 * Signature, shop domain and topic checks plus payload parsing
 */

import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import { OrderWebhookHandler } from '../storefront/webhooks.js';
import { ValidationError } from '../errors.js';

const SECRET = 'test-secret';

function sign(body: string, secret = SECRET): string {
  return crypto.createHmac('sha256', secret).update(body).digest('base64');
}

describe('OrderWebhookHandler', () => {
  const handler = new OrderWebhookHandler(SECRET);
  const body = JSON.stringify({ id: 1001, name: '#1001', line_items: [] });

  describe('validateSignature', () => {
    it('accepts the base64 HMAC of the raw body', () => {
      expect(handler.validateSignature(body, sign(body))).toEqual({ valid: true });
    });

    it('accepts a Buffer payload', () => {
      expect(handler.validateSignature(Buffer.from(body), sign(body))).toEqual({ valid: true });
    });

    it('rejects a signature made with another secret', () => {
      expect(handler.validateSignature(body, sign(body, 'other-secret'))).toEqual({
        valid: false,
        error: 'Invalid signature',
      });
    });

    it('rejects a signature of a different length', () => {
      expect(handler.validateSignature(body, 'short')).toEqual({ valid: false, error: 'Invalid signature' });
    });

    it('rejects a missing signature', () => {
      expect(handler.validateSignature(body, undefined)).toEqual({ valid: false, error: 'Missing signature' });
    });

    it('rejects everything when no secret is configured', () => {
      const unconfigured = new OrderWebhookHandler();

      expect(unconfigured.validateSignature(body, sign(body))).toEqual({
        valid: false,
        error: 'Webhook secret not configured',
      });
    });
  });

  describe('validateShopDomain', () => {
    it('accepts myshopify domains', () => {
      expect(handler.validateShopDomain('test-shop.myshopify.com')).toEqual({ valid: true });
    });

    it('rejects other domains', () => {
      expect(handler.validateShopDomain('test-shop.example.com')).toEqual({
        valid: false,
        error: 'Invalid shop domain: test-shop.example.com',
      });
    });

    it('rejects a missing domain', () => {
      expect(handler.validateShopDomain(undefined).valid).toBe(false);
    });
  });

  describe('isProcessableTopic', () => {
    it.each([
      ['orders/create', true],
      ['orders/paid', true],
      ['orders/cancelled', false],
      [undefined, false],
    ])('%s -> %s', (topic, expected) => {
      expect(handler.isProcessableTopic(topic)).toBe(expected);
    });
  });

  describe('parseOrder', () => {
    it('maps line items to sku, quantity and title', () => {
      const payload = JSON.stringify({
        id: 1001,
        name: '#1001',
        line_items: [
          { sku: 'A', quantity: 3, title: 'Widget' },
          { sku: null, quantity: 1, title: 'Gift card' },
          { sku: ' B ', quantity: '2', name: 'Gadget - Blue' },
        ],
      });

      expect(handler.parseOrder(payload)).toEqual({
        orderId: '1001',
        orderName: '#1001',
        lineItems: [
          { sku: 'A', quantity: 3, title: 'Widget' },
          { sku: '', quantity: 1, title: 'Gift card' },
          { sku: 'B', quantity: 2, title: 'Gadget - Blue' },
        ],
      });
    });

    it('tolerates a payload without line items', () => {
      expect(handler.parseOrder('{}')).toEqual({ orderId: null, orderName: null, lineItems: [] });
    });

    it('rejects invalid JSON', () => {
      expect(() => handler.parseOrder('{not json')).toThrow(ValidationError);
      expect(() => handler.parseOrder('{not json')).toThrow('Invalid JSON payload');
    });

    it('rejects a payload whose line items are not a list', () => {
      expect(() => handler.parseOrder(JSON.stringify({ line_items: 'A' }))).toThrow('Invalid order payload');
    });
  });
});
