/**
 * Service Wiring Tests
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { LedgerApiClient, StorefrontApiClient } from '@stockbridge/integrations';
import { createServices } from '../container.js';
import { loadConfig } from '../config/index.js';

describe('createServices', () => {
  it('builds both clients and an idle engine', () => {
    const config = loadConfig({
      LEDGER_HOST: 'ledger.test',
      STOREFRONT_SHOP_URL: 'test-shop.myshopify.com',
      STOREFRONT_WEBHOOK_SECRET: 'test-secret',
    });

    const services = createServices(config, { logger: pino({ level: 'silent' }), schedulerEnabled: false });

    expect(services.ledger).toBeInstanceOf(LedgerApiClient);
    expect(services.storefront).toBeInstanceOf(StorefrontApiClient);
    expect(services.engine.getStatus()).toMatchObject({ state: 'stopped', scheduler: { enabled: false } });
    expect(services.webhookHandler.computeSignature('{}')).toBe(
      services.webhookHandler.computeSignature(Buffer.from('{}'))
    );
  });
});
