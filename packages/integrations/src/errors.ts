/**
 * Error Taxonomy
 * Every failure raised by the ledger and storefront clients extends StockBridgeError.
 * The `code` doubles as the error kind recorded in sync outcomes.
 */

export class StockBridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'StockBridgeError';
  }
}

/** Login or session failure against the ledger */
export class AuthenticationError extends StockBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'AuthenticationError', details);
    this.name = 'AuthenticationError';
  }
}

/** Non-success ledger response not covered by the "no records" sentinel */
export class LedgerAPIError extends StockBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'LedgerAPIError', details);
    this.name = 'LedgerAPIError';
  }
}

export class StorefrontAPIError extends StockBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'StorefrontAPIError', details);
    this.name = 'StorefrontAPIError';
  }
}

/** An identifier or SKU absent in one of the two systems */
export class NotFoundError extends StockBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'NotFoundError', details);
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends StockBridgeError {
  constructor(
    message: string,
    public readonly retryAfterMs: number,
    details: Record<string, unknown> = {}
  ) {
    super(message, 'RateLimitError', { retryAfterMs, ...details });
    this.name = 'RateLimitError';
  }
}

/** Malformed or unsigned input, rejected before processing */
export class ValidationError extends StockBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'ValidationError', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends StockBridgeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'ConfigurationError', details);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Map any thrown value to the kind string written into outcomes
 */
export function errorKind(error: unknown): string {
  if (error instanceof StockBridgeError) {
    return error.code;
  }
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  return 'UnknownError';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

export function errorDetails(error: unknown): Record<string, unknown> {
  return error instanceof StockBridgeError ? error.details : {};
}
