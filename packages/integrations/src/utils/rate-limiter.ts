/**
 * Rate Limiter Utility
 * Request queues per remote system and call-budget header parsing
 */

import PQueue from 'p-queue';

// ============================================================================
// Types
// ============================================================================

export interface RateLimiterOptions {
  /** Maximum concurrent requests */
  concurrency: number;
  /** Time interval in milliseconds */
  intervalMs: number;
  /** Maximum requests per interval */
  maxPerInterval: number;
  /** Whether to auto-start processing */
  autoStart?: boolean;
}

/** Parsed `used/limit` call budget */
export interface CallBudget {
  used: number;
  limit: number;
}

// ============================================================================
// Pre-configured Rate Limits by API
// ============================================================================

export const API_RATE_LIMITS = {
  ledger: {
    concurrency: 4,
    intervalMs: 60000, // 1 minute
    maxPerInterval: 600,
  },
  storefront: {
    // One call at a time so the pacing delay holds across callers
    concurrency: 1,
    intervalMs: 1000,
    maxPerInterval: 4,
  },
} as const satisfies Record<string, RateLimiterOptions>;

export type ApiSystem = keyof typeof API_RATE_LIMITS;

/** Usage ratio at which the storefront client starts backing off */
export const CALL_BUDGET_THRESHOLD = 0.9;

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a rate limiter with custom options
 */
export function createRateLimiter(options: RateLimiterOptions): PQueue {
  return new PQueue({
    concurrency: options.concurrency,
    interval: options.intervalMs,
    intervalCap: options.maxPerInterval,
    carryoverConcurrencyCount: false,
    autoStart: options.autoStart ?? true,
  });
}

export function createApiRateLimiter(system: ApiSystem): PQueue {
  return createRateLimiter(API_RATE_LIMITS[system]);
}

// ============================================================================
// Header Parsing
// ============================================================================

/**
 * Parse a `used/limit` header value, null when absent or malformed
 */
export function parseCallBudget(header: unknown): CallBudget | null {
  if (typeof header !== 'string') {
    return null;
  }
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(header);
  if (!match) {
    return null;
  }
  const used = parseInt(match[1], 10);
  const limit = parseInt(match[2], 10);
  if (limit <= 0) {
    return null;
  }
  return { used, limit };
}

export function isBudgetNearlyExhausted(
  budget: CallBudget | null,
  threshold: number = CALL_BUDGET_THRESHOLD
): boolean {
  return budget !== null && budget.used / budget.limit >= threshold;
}

/**
 * Retry-After in milliseconds; seconds on the wire, fallback when missing
 */
export function parseRetryAfterMs(header: unknown, fallbackMs = 2000): number {
  if (typeof header !== 'string' && typeof header !== 'number') {
    return fallbackMs;
  }
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return fallbackMs;
  }
  return Math.round(seconds * 1000);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
