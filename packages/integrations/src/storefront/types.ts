/**
 * Storefront Admin API Types
 */

import { z } from 'zod';
import type { AxiosAdapter } from 'axios';
import type { Logger } from 'pino';
import type { RetryPolicy } from '../utils/retry.js';

export const DEFAULT_API_VERSION = '2024-01';
export const DEFAULT_RATE_LIMIT_DELAY_MS = 500;
export const LOCATION_GID_PREFIX = 'gid://shopify/Location/';
export const CALL_LIMIT_HEADER = 'x-shopify-shop-api-call-limit';

// ============================================================================
// Client Configuration
// ============================================================================

export interface StorefrontClientConfig {
  /** Shop domain, with or without scheme */
  shopUrl: string;
  accessToken: string;
  /** Numeric location id or full location GID */
  locationId: string;
  apiVersion?: string;
  /** Pause after every successful call */
  rateLimitDelayMs?: number;
  /** Pause once the call budget is 90% spent; defaults to twice the pacing delay */
  rateLimitBackoffMs?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
  retryPolicy?: RetryPolicy;
  logger: Logger;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
  sleep?: (ms: number) => Promise<void>;
}

export interface SkuReference {
  variantReference: string;
  inventoryItemReference: string;
}

// ============================================================================
// Wire Schemas
// ============================================================================

export const graphqlEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export const variantLookupSchema = z.object({
  productVariants: z.object({
    edges: z.array(
      z.object({
        node: z.object({
          id: z.string(),
          sku: z.string().nullable(),
          inventoryItem: z.object({ id: z.string() }),
        }),
      })
    ),
  }),
});

export const inventoryLevelSchema = z.object({
  inventoryItem: z
    .object({
      id: z.string(),
      inventoryLevel: z
        .object({
          quantities: z.array(z.object({ name: z.string(), quantity: z.number() })),
        })
        .nullable(),
    })
    .nullable(),
});

export const userErrorSchema = z.object({
  field: z.array(z.string()).nullable().optional(),
  message: z.string(),
});

export const inventorySetSchema = z.object({
  inventorySetQuantities: z
    .object({
      userErrors: z.array(userErrorSchema),
    })
    .nullable(),
});

export const shopSchema = z.object({
  shop: z.object({ name: z.string() }),
});

export type UserError = z.infer<typeof userErrorSchema>;
