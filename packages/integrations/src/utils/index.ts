/**
 * Utility Functions
 * Rate limiting, retry logic, and helpers
 */

// Rate limiter exports
export {
  createRateLimiter,
  createApiRateLimiter,
  parseCallBudget,
  isBudgetNearlyExhausted,
  parseRetryAfterMs,
  sleep,
  API_RATE_LIMITS,
  CALL_BUDGET_THRESHOLD,
  type RateLimiterOptions,
  type CallBudget,
  type ApiSystem,
} from './rate-limiter.js';

// Retry exports
export {
  withRetry,
  createTransportRetryPolicy,
  isTransientTransportError,
  DEFAULT_TRANSPORT_RETRY_POLICY,
  TRANSIENT_ERROR_CODES,
  type RetryPolicy,
  type RetryOptions,
} from './retry.js';
