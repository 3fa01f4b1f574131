/**
 * Ledger Integration
 * Stock of record, derived server-side from movement history
 */

// Export types
export * from './types.js';

// Export session cache
export {
  SessionTokenCache,
  DEFAULT_SESSION_TTL_MS,
  type SessionToken,
  type SessionTokenCacheOptions,
} from './session.js';

// Export client
export { LedgerApiClient, createLedgerClient, normalizeHost } from './client.js';

// Export parsers
export {
  normalizeQuantity,
  parseEnvelope,
  parseProduct,
  parseStockRecord,
  toForeignKey,
} from './parsers.js';
