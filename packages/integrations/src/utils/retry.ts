/**
 * Retry Utility with Exponential Backoff
 * Transport-level retry for timeouts and dropped connections
 */

import pRetry from 'p-retry';
import { isAxiosError } from 'axios';

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicy {
  /** Retry attempts after the first call */
  retries: number;
  /** Minimum timeout between retries in milliseconds */
  minTimeout: number;
  /** Maximum timeout between retries in milliseconds */
  maxTimeout: number;
  /** Factor to multiply timeout by on each retry */
  factor: number;
  /** Whether to randomize timeouts */
  randomize?: boolean;
  /** Decides whether an error is worth another attempt */
  shouldRetry: (error: Error) => boolean;
}

export interface RetryOptions extends RetryPolicy {
  /** Callback on each failed attempt that will be retried */
  onRetry?: (error: Error, attempt: number) => void;
}

// ============================================================================
// Error Classification
// ============================================================================

export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
]);

/**
 * A timeout or network failure with no HTTP response attached.
 * Responses of any status are left to the caller.
 */
export function isTransientTransportError(error: Error): boolean {
  if (!isAxiosError(error)) {
    return false;
  }
  if (error.response) {
    return false;
  }
  return error.code !== undefined && TRANSIENT_ERROR_CODES.has(error.code);
}

// ============================================================================
// Default Configuration
// ============================================================================

/** 3 attempts in total, 1s then 2s between them */
export const DEFAULT_TRANSPORT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  minTimeout: 1000,
  maxTimeout: 10000,
  factor: 2,
  randomize: false,
  shouldRetry: isTransientTransportError,
};

/**
 * Build a transport policy from the configured attempt count and base delay
 */
export function createTransportRetryPolicy(
  overrides: { maxAttempts?: number; baseDelayMs?: number } = {}
): RetryPolicy {
  const maxAttempts = Math.max(1, overrides.maxAttempts ?? DEFAULT_TRANSPORT_RETRY_POLICY.retries + 1);
  return {
    ...DEFAULT_TRANSPORT_RETRY_POLICY,
    retries: maxAttempts - 1,
    minTimeout: overrides.baseDelayMs ?? DEFAULT_TRANSPORT_RETRY_POLICY.minTimeout,
  };
}

// ============================================================================
// Retry Functions
// ============================================================================

/**
 * Execute a function with automatic retries using exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  return pRetry(fn, {
    retries: options.retries,
    minTimeout: options.minTimeout,
    maxTimeout: options.maxTimeout,
    factor: options.factor,
    randomize: options.randomize ?? false,
    shouldRetry: (error) => options.shouldRetry(error),
    onFailedAttempt: (error) => {
      if (error.retriesLeft > 0 && options.shouldRetry(error) && options.onRetry) {
        options.onRetry(error, error.attemptNumber);
      }
    },
  });
}
