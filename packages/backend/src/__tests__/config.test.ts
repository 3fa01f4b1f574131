/**
 * Configuration Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConfigurationError } from '@stockbridge/integrations';
import { describeConfig, loadConfig, maskSecret } from '../config/index.js';

const credentials = {
  LEDGER_HOST: 'ledger.test',
  LEDGER_DATABASE: 'Inventory',
  LEDGER_USERNAME: 'sync',
  LEDGER_PASSWORD: 'test-password',
  STOREFRONT_SHOP_URL: 'test-shop.myshopify.com',
  STOREFRONT_ACCESS_TOKEN: 'test-token',
  STOREFRONT_LOCATION_ID: '555',
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      env: 'development',
      server: { port: 8000, host: '0.0.0.0' },
      logLevel: 'debug',
      ledger: { host: '', sessionTtlMs: 840_000 },
      storefront: { apiVersion: '2024-01', rateLimitDelayMs: 500, validateSignature: true },
      http: { timeoutMs: 30_000, maxAttempts: 3, retryDelayMs: 1000 },
      sync: { recalcPacingMs: 200, nightlyHour: 22, nightlyMinute: 0, startupDelayMs: 10_000 },
    });
    expect(config.storefront.webhookSecret).toBeUndefined();
  });

  it('coerces numbers and flags', () => {
    const config = loadConfig({
      PORT: '9000',
      NIGHTLY_SYNC_HOUR: '3',
      WEBHOOK_VALIDATE_SIGNATURE: 'false',
      SESSION_TTL_SECONDS: '600',
      LOG_LEVEL: 'warn',
    });

    expect(config.server.port).toBe(9000);
    expect(config.sync.nightlyHour).toBe(3);
    expect(config.storefront.validateSignature).toBe(false);
    expect(config.ledger.sessionTtlMs).toBe(600_000);
    expect(config.logLevel).toBe('warn');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ LEDGER_HOST: '   ', STOREFRONT_WEBHOOK_SECRET: '' }).ledger.host).toBe('');
    expect(loadConfig({ STOREFRONT_WEBHOOK_SECRET: '' }).storefront.webhookSecret).toBeUndefined();
  });

  it('falls back to defaults on invalid values outside production', () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const config = loadConfig({ PORT: 'not-a-port' });

    expect(config.server.port).toBe(8000);
    expect(errors).toHaveBeenCalled();
  });

  it('requires credentials in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ NODE_ENV: 'production', ...credentials, LEDGER_PASSWORD: '' })).toThrow(
      'Missing required configuration: LEDGER_PASSWORD'
    );
  });

  it('rejects invalid values in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', ...credentials, PORT: 'not-a-port' })).toThrow(
      'Invalid environment configuration'
    );
  });

  it('loads a complete production environment', () => {
    const config = loadConfig({ NODE_ENV: 'production', ...credentials });

    expect(config.logLevel).toBe('info');
    expect(config.ledger).toMatchObject({ host: 'ledger.test', database: 'Inventory', username: 'sync' });
    expect(config.storefront.locationId).toBe('555');
  });
});

describe('maskSecret', () => {
  it('keeps only the first four characters', () => {
    expect(maskSecret('test-secret')).toBe('test****');
    expect(maskSecret('abc')).toBe('****');
    expect(maskSecret(undefined)).toBe('(not set)');
  });
});

describe('describeConfig', () => {
  it('never prints a secret in full', () => {
    const lines = describeConfig(loadConfig({ ...credentials, STOREFRONT_WEBHOOK_SECRET: 'test-secret' }));

    expect(lines).toContainEqual(['Ledger password', 'test****']);
    expect(lines).toContainEqual(['Storefront access token', 'test****']);
    expect(lines).toContainEqual(['Webhook secret', 'test****']);
    expect(lines).toContainEqual(['Nightly sync', '22:00']);
  });
});
