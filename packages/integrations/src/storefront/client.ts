/**
 * Storefront API Client
 * Available quantity reads and absolute sets at a single location, with call-budget pacing
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type PQueue from 'p-queue';
import type { Logger } from 'pino';
import type { z } from 'zod';
import {
  NotFoundError,
  RateLimitError,
  StorefrontAPIError,
  ValidationError,
  errorKind,
  errorMessage,
} from '../errors.js';
import {
  createApiRateLimiter,
  isBudgetNearlyExhausted,
  parseCallBudget,
  parseRetryAfterMs,
  sleep,
} from '../utils/rate-limiter.js';
import { DEFAULT_TRANSPORT_RETRY_POLICY, withRetry, type RetryPolicy } from '../utils/retry.js';
import type {
  BulkSetResult,
  ConnectionCheck,
  QuantityUpdate,
  StorefrontInventoryRecord,
  StorefrontOperations,
} from '../types.js';
import {
  INVENTORY_LEVEL_QUERY,
  INVENTORY_SET_MUTATION,
  SHOP_QUERY,
  SKU_LOOKUP_QUERY,
} from './queries.js';
import {
  CALL_LIMIT_HEADER,
  DEFAULT_API_VERSION,
  DEFAULT_RATE_LIMIT_DELAY_MS,
  LOCATION_GID_PREFIX,
  graphqlEnvelopeSchema,
  inventoryLevelSchema,
  inventorySetSchema,
  shopSchema,
  variantLookupSchema,
  type SkuReference,
  type StorefrontClientConfig,
  type UserError,
} from './types.js';

const HTTP_TOO_MANY_REQUESTS = 429;

export function toLocationGid(locationId: string): string {
  const trimmed = locationId.trim();
  return trimmed.startsWith('gid://') ? trimmed : `${LOCATION_GID_PREFIX}${trimmed}`;
}

export function normalizeShopUrl(shopUrl: string): string {
  const trimmed = shopUrl.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function skuSearchQuery(sku: string): string {
  return `sku:"${sku.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatUserErrors(userErrors: UserError[]): string[] {
  return userErrors.map((userError) =>
    userError.field && userError.field.length > 0
      ? `${userError.field.join('.')}: ${userError.message}`
      : userError.message
  );
}

export class StorefrontApiClient implements StorefrontOperations {
  private readonly httpClient: AxiosInstance;
  private readonly rateLimiter: PQueue;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;
  private readonly locationId: string;
  private readonly rateLimitDelayMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly skuCache = new Map<string, SkuReference>();

  constructor(config: StorefrontClientConfig) {
    const apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;

    this.locationId = toLocationGid(config.locationId);
    this.rateLimitDelayMs = config.rateLimitDelayMs ?? DEFAULT_RATE_LIMIT_DELAY_MS;
    this.rateLimitBackoffMs = config.rateLimitBackoffMs ?? this.rateLimitDelayMs * 2;
    this.retryPolicy = config.retryPolicy ?? DEFAULT_TRANSPORT_RETRY_POLICY;
    this.sleep = config.sleep ?? sleep;
    this.logger = config.logger.child({ component: 'storefront-client' });

    this.httpClient = axios.create({
      baseURL: `${normalizeShopUrl(config.shopUrl)}/admin/api/${apiVersion}`,
      timeout: config.timeout ?? 30000,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'X-Shopify-Access-Token': config.accessToken,
      },
      // Status and headers are inspected for every response
      validateStatus: () => true,
      adapter: config.adapter,
    });

    this.rateLimiter = createApiRateLimiter('storefront');
  }

  // ============================================================================
  // Inventory Operations
  // ============================================================================

  /**
   * Available quantity at the configured location, null when the SKU is unknown
   */
  async getQuantity(sku: string): Promise<StorefrontInventoryRecord | null> {
    const reference = await this.resolveSku(sku);
    if (!reference) {
      return null;
    }

    const data = await this.graphql(
      inventoryLevelSchema,
      INVENTORY_LEVEL_QUERY,
      { inventoryItemId: reference.inventoryItemReference, locationId: this.locationId },
      'inventory level read'
    );

    if (!data.inventoryItem) {
      // Item deleted since it was cached
      this.skuCache.delete(sku);
      return null;
    }

    const available = data.inventoryItem.inventoryLevel?.quantities.find(
      (quantity) => quantity.name === 'available'
    );

    return {
      sku,
      availableQuantity: available ? Math.trunc(available.quantity) : 0,
      ...reference,
    };
  }

  /**
   * Set the absolute available quantity at the configured location
   */
  async setQuantity(sku: string, quantity: number): Promise<void> {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new ValidationError(`Quantity for ${sku} must be a non-negative integer`, { sku, quantity });
    }

    const reference = await this.resolveSku(sku);
    if (!reference) {
      throw new NotFoundError(`SKU ${sku} not found in storefront`, { sku });
    }

    const data = await this.graphql(
      inventorySetSchema,
      INVENTORY_SET_MUTATION,
      {
        input: {
          reason: 'correction',
          name: 'available',
          ignoreCompareQuantity: true,
          quantities: [
            {
              inventoryItemId: reference.inventoryItemReference,
              locationId: this.locationId,
              quantity,
            },
          ],
        },
      },
      'inventory set'
    );

    const result = data.inventorySetQuantities;
    if (!result) {
      throw new StorefrontAPIError(`Inventory set for ${sku} returned no result`, { sku });
    }
    if (result.userErrors.length > 0) {
      const messages = formatUserErrors(result.userErrors);
      throw new StorefrontAPIError(`Inventory set for ${sku} rejected: ${messages.join('; ')}`, {
        sku,
        userErrors: messages,
      });
    }

    this.logger.info({ sku, quantity }, 'Storefront quantity set');
  }

  /**
   * Apply each update independently and collect the outcome
   */
  async bulkSet(updates: QuantityUpdate[]): Promise<BulkSetResult> {
    const result: BulkSetResult = { successCount: 0, errorCount: 0, errors: [] };

    for (const update of updates) {
      try {
        await this.setQuantity(update.sku, update.quantity);
        result.successCount++;
      } catch (error) {
        result.errorCount++;
        result.errors.push({ sku: update.sku, kind: errorKind(error), message: errorMessage(error) });
        this.logger.warn({ sku: update.sku, err: error }, 'Bulk update entry failed');
      }
    }

    return result;
  }

  // ============================================================================
  // SKU Resolution
  // ============================================================================

  /**
   * Drop every cached SKU reference so the next lookups see the current catalog
   */
  invalidateCache(): void {
    this.skuCache.clear();
  }

  private async resolveSku(sku: string): Promise<SkuReference | null> {
    const cached = this.skuCache.get(sku);
    if (cached) {
      return cached;
    }

    const data = await this.graphql(
      variantLookupSchema,
      SKU_LOOKUP_QUERY,
      { query: skuSearchQuery(sku) },
      'SKU lookup'
    );

    const node = data.productVariants.edges
      .map((edge) => edge.node)
      .find((candidate) => candidate.sku === sku);
    if (!node) {
      return null;
    }

    const reference: SkuReference = {
      variantReference: node.id,
      inventoryItemReference: node.inventoryItem.id,
    };
    this.skuCache.set(sku, reference);
    return reference;
  }

  // ============================================================================
  // Health
  // ============================================================================

  async healthCheck(): Promise<ConnectionCheck> {
    try {
      const data = await this.graphql(shopSchema, SHOP_QUERY, {}, 'shop read');
      this.logger.debug({ shop: data.shop.name }, 'Storefront reachable');
      return { success: true };
    } catch (error) {
      this.logger.error({ err: error }, 'Storefront health check failed');
      return { success: false, error: errorMessage(error) };
    }
  }

  // ============================================================================
  // Transport
  // ============================================================================

  /**
   * One GraphQL call through the queue: request, budget check, validation, pacing
   */
  private async graphql<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query: string,
    variables: Record<string, unknown>,
    operation: string
  ): Promise<T> {
    return this.rateLimiter.add(
      async () => {
        const response = await withRetry(
          () => this.httpClient.post<unknown>('/graphql.json', { query, variables }),
          {
            ...this.retryPolicy,
            onRetry: (error, attempt) => {
              this.logger.warn({ attempt, operation, err: error }, 'Storefront request failed, retrying');
            },
          }
        );

        await this.applyRateLimitPolicy(response, operation);
        const data = this.parseResponse(response, schema, operation);
        await this.sleep(this.rateLimitDelayMs);
        return data;
      },
      { throwOnTimeout: true }
    );
  }

  private async applyRateLimitPolicy(response: AxiosResponse<unknown>, operation: string): Promise<void> {
    const budget = parseCallBudget(response.headers[CALL_LIMIT_HEADER]);
    if (isBudgetNearlyExhausted(budget)) {
      this.logger.warn({ budget, backoffMs: this.rateLimitBackoffMs }, 'Storefront call budget nearly spent, backing off');
      await this.sleep(this.rateLimitBackoffMs);
    }

    if (response.status === HTTP_TOO_MANY_REQUESTS) {
      const retryAfterMs = parseRetryAfterMs(response.headers['retry-after']);
      this.logger.warn({ operation, retryAfterMs }, 'Storefront rate limit hit');
      await this.sleep(retryAfterMs);
      throw new RateLimitError(`Storefront rate limit exceeded during ${operation}`, retryAfterMs);
    }
  }

  private parseResponse<T>(
    response: AxiosResponse<unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    operation: string
  ): T {
    if (response.status < 200 || response.status >= 300) {
      throw new StorefrontAPIError(`Storefront ${operation} failed with HTTP ${response.status}`, {
        status: response.status,
      });
    }

    const envelope = graphqlEnvelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new StorefrontAPIError(`Malformed storefront response for ${operation}`);
    }

    const errors = envelope.data.errors ?? [];
    if (errors.length > 0) {
      const messages = errors.map((error) => error.message);
      throw new StorefrontAPIError(`Storefront ${operation} returned errors: ${messages.join('; ')}`, {
        errors: messages,
      });
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      throw new StorefrontAPIError(`Unexpected storefront response shape for ${operation}`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return parsed.data;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createStorefrontClient(config: StorefrontClientConfig): StorefrontApiClient {
  return new StorefrontApiClient(config);
}
