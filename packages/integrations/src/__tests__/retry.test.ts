/**
 * Retry & Rate Limit Utility Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import {
  DEFAULT_TRANSPORT_RETRY_POLICY,
  createTransportRetryPolicy,
  isTransientTransportError,
  withRetry,
} from '../utils/retry.js';
import { isBudgetNearlyExhausted, parseCallBudget, parseRetryAfterMs } from '../utils/rate-limiter.js';
import { timeoutError } from '../__mocks__/http-adapter.js';

const fastPolicy = { ...DEFAULT_TRANSPORT_RETRY_POLICY, minTimeout: 1, maxTimeout: 1 };

describe('isTransientTransportError', () => {
  it('treats timeouts and dropped connections as transient', () => {
    expect(isTransientTransportError(timeoutError())).toBe(true);
    expect(isTransientTransportError(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
  });

  it('never retries a request that got a response', () => {
    const error = new AxiosError('Request failed', 'ETIMEDOUT', undefined, undefined, {
      data: {},
      status: 504,
      statusText: 'Gateway Timeout',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });

    expect(isTransientTransportError(error)).toBe(false);
  });

  it('ignores errors that did not come from the transport', () => {
    expect(isTransientTransportError(new Error('ETIMEDOUT'))).toBe(false);
  });
});

describe('withRetry', () => {
  it('retries transient failures and returns the eventual result', async () => {
    const onRetry = vi.fn();
    const fn = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(timeoutError())
      .mockResolvedValueOnce('ok');

    const result = await withRetry(fn, { ...fastPolicy, onRetry });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][1]).toBe(1);
  });

  it('gives up after the configured attempts', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(timeoutError());

    await expect(withRetry(fn, fastPolicy)).rejects.toThrow('timeout of 30000ms exceeded');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry errors the policy rejects', async () => {
    const fn = vi.fn<[], Promise<string>>().mockRejectedValue(new Error('bad input'));

    await expect(withRetry(fn, fastPolicy)).rejects.toThrow('bad input');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('createTransportRetryPolicy', () => {
  it('converts attempts and base delay into a policy', () => {
    const policy = createTransportRetryPolicy({ maxAttempts: 5, baseDelayMs: 250 });

    expect(policy.retries).toBe(4);
    expect(policy.minTimeout).toBe(250);
    expect(policy.factor).toBe(2);
  });

  it('always allows at least one attempt', () => {
    expect(createTransportRetryPolicy({ maxAttempts: 0 }).retries).toBe(0);
  });
});

describe('call budget helpers', () => {
  it('parses used/limit headers', () => {
    expect(parseCallBudget('39/40')).toEqual({ used: 39, limit: 40 });
    expect(parseCallBudget('garbage')).toBeNull();
    expect(parseCallBudget(undefined)).toBeNull();
  });

  it('flags usage at or above 90%', () => {
    expect(isBudgetNearlyExhausted({ used: 36, limit: 40 })).toBe(true);
    expect(isBudgetNearlyExhausted({ used: 10, limit: 40 })).toBe(false);
    expect(isBudgetNearlyExhausted(null)).toBe(false);
  });

  it('reads Retry-After seconds with a 2 second default', () => {
    expect(parseRetryAfterMs('2.5')).toBe(2500);
    expect(parseRetryAfterMs(undefined)).toBe(2000);
    expect(parseRetryAfterMs('soon')).toBe(2000);
  });
});
