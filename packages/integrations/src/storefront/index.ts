/**
 * Storefront Integration
 * Admin GraphQL client and order webhook verification
 */

// Export types
export * from './types.js';

// Export client
export {
  StorefrontApiClient,
  createStorefrontClient,
  normalizeShopUrl,
  toLocationGid,
} from './client.js';

// Export webhook handler
export {
  OrderWebhookHandler,
  createOrderWebhookHandler,
  ORDER_TOPICS,
  SHOP_DOMAIN_SUFFIX,
  type OrderTopic,
  type OrderEvent,
  type OrderLineItem,
  type WebhookValidationResult,
} from './webhooks.js';
