/**
 * StockBridge - Integrations Package
 * Connectors for the ledger (stock of record) and the storefront
 *
 * @packageDocumentation
 */

// ============================================================================
// Shared Types & Errors
// ============================================================================

export * from './types.js';

export {
  StockBridgeError,
  AuthenticationError,
  LedgerAPIError,
  StorefrontAPIError,
  NotFoundError,
  RateLimitError,
  ValidationError,
  ConfigurationError,
  errorKind,
  errorMessage,
  errorDetails,
} from './errors.js';

// ============================================================================
// Ledger Integration
// ============================================================================

export * from './ledger/index.js';

// ============================================================================
// Storefront Integration
// ============================================================================

export * from './storefront/index.js';

// ============================================================================
// Utilities
// ============================================================================

export * from './utils/index.js';
