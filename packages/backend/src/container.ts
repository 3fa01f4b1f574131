/**
 * Service wiring: one session cache, one client per system, one engine
 */

import type { Logger } from 'pino';
import {
  LedgerApiClient,
  OrderWebhookHandler,
  SessionTokenCache,
  StorefrontApiClient,
  createTransportRetryPolicy,
} from '@stockbridge/integrations';
import { SyncEngine } from '@stockbridge/sync-engine';
import type { AppConfig } from './config/index.js';
import { createLogger } from './logger.js';

export interface Services {
  config: AppConfig;
  logger: Logger;
  ledger: LedgerApiClient;
  storefront: StorefrontApiClient;
  engine: SyncEngine;
  webhookHandler: OrderWebhookHandler;
}

export interface CreateServicesOptions {
  logger?: Logger;
  schedulerEnabled?: boolean;
}

export function createServices(config: AppConfig, options: CreateServicesOptions = {}): Services {
  const logger = options.logger ?? createLogger(config);
  const retryPolicy = createTransportRetryPolicy({
    maxAttempts: config.http.maxAttempts,
    baseDelayMs: config.http.retryDelayMs,
  });

  const ledger = new LedgerApiClient({
    host: config.ledger.host,
    database: config.ledger.database,
    username: config.ledger.username,
    password: config.ledger.password,
    sessionCache: new SessionTokenCache({ ttlMs: config.ledger.sessionTtlMs }),
    timeout: config.http.timeoutMs,
    retryPolicy,
    logger,
  });

  const storefront = new StorefrontApiClient({
    shopUrl: config.storefront.shopUrl,
    accessToken: config.storefront.accessToken,
    locationId: config.storefront.locationId,
    apiVersion: config.storefront.apiVersion,
    rateLimitDelayMs: config.storefront.rateLimitDelayMs,
    timeout: config.http.timeoutMs,
    retryPolicy,
    logger,
  });

  const engine = new SyncEngine({
    ledger,
    storefront,
    logger,
    config: {
      recalcPacingMs: config.sync.recalcPacingMs,
      nightlyHour: config.sync.nightlyHour,
      nightlyMinute: config.sync.nightlyMinute,
      startupDelayMs: config.sync.startupDelayMs,
      schedulerEnabled: options.schedulerEnabled ?? true,
    },
  });

  return {
    config,
    logger,
    ledger,
    storefront,
    engine,
    webhookHandler: new OrderWebhookHandler(config.storefront.webhookSecret),
  };
}
