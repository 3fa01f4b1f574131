/**
 * Sync Result Aggregator Tests
 */

import { describe, it, expect } from 'vitest';
import { LedgerAPIError, NotFoundError } from '@stockbridge/integrations';
import { SYSTEM_IDENTIFIER, SyncResultAggregator, formatSummary, outcomeToJSON } from '../results.js';
import type { SyncOutcome } from '../types.js';

function steppingClock(stepMs: number) {
  let tick = 0;
  const base = Date.UTC(2024, 0, 15, 22, 0, 0);
  return () => new Date(base + stepMs * tick++);
}

function outcomeWith(overrides: Partial<SyncOutcome>): SyncOutcome {
  return {
    success: true,
    total: 0,
    updatedCount: 0,
    skippedCount: 0,
    failedCount: 0,
    errors: [],
    startedAt: new Date(Date.UTC(2024, 0, 15, 22, 0, 0)),
    endedAt: new Date(Date.UTC(2024, 0, 15, 22, 0, 1)),
    durationMs: 1234,
    successRate: 0,
    metadata: {},
    ...overrides,
  };
}

describe('SyncResultAggregator', () => {
  it('counts each item under exactly one status', () => {
    const aggregator = new SyncResultAggregator();
    aggregator.setTotal(4);

    expect(aggregator.record('A', 'updated')).toBe(true);
    aggregator.record('B', 'skipped');
    aggregator.fail('C', new NotFoundError('SKU C not found in storefront', { sku: 'C' }));
    expect(aggregator.record('A', 'failed')).toBe(false);

    const outcome = aggregator.finalize();

    expect(outcome).toMatchObject({
      success: false,
      total: 4,
      updatedCount: 1,
      skippedCount: 1,
      failedCount: 1,
      successRate: 25,
    });
    expect(outcome.errors).toHaveLength(1);
    expect(outcome.errors[0]).toMatchObject({
      identifier: 'C',
      kind: 'NotFoundError',
      message: 'SKU C not found in storefront',
      details: { sku: 'C' },
    });
    expect(aggregator.statusOf('A')).toBe('updated');
  });

  it('keeps an extra error for an already failed item without counting it twice', () => {
    const aggregator = new SyncResultAggregator();
    aggregator.setTotal(1);

    aggregator.fail('A', new LedgerAPIError('recalculation failed'));
    aggregator.fail('A', new Error('set failed'));

    const outcome = aggregator.finalize();
    expect(outcome.failedCount).toBe(1);
    expect(outcome.errors.map((error) => error.message)).toEqual(['recalculation failed', 'set failed']);
    expect(outcome.errors[1].details).toBeUndefined();
  });

  it('counts a system failure as one failed item', () => {
    const aggregator = new SyncResultAggregator();

    aggregator.failSystem(new LedgerAPIError('Failed to list products: HTTP 500'));
    const outcome = aggregator.finalize();

    expect(outcome).toMatchObject({ success: false, total: 1, failedCount: 1, updatedCount: 0 });
    expect(outcome.errors[0]).toMatchObject({ identifier: SYSTEM_IDENTIFIER, kind: 'LedgerAPIError' });
  });

  it('reports success with a zero rate when there is nothing to do', () => {
    const outcome = new SyncResultAggregator().finalize();

    expect(outcome).toMatchObject({ success: true, total: 0, successRate: 0, errors: [] });
  });

  it('measures duration between construction and finalize', () => {
    const aggregator = new SyncResultAggregator({ clock: steppingClock(1500), metadata: { mode: 'full' } });
    aggregator.setMetadata('dryRun', true);

    const outcome = aggregator.finalize();

    expect(outcome.durationMs).toBe(1500);
    expect(outcome.metadata).toEqual({ mode: 'full', dryRun: true });
  });
});

describe('formatSummary', () => {
  it('lists counts and the success rate', () => {
    const summary = formatSummary(
      outcomeWith({ total: 3, updatedCount: 1, skippedCount: 2, successRate: (1 / 3) * 100 })
    );

    expect(summary.split('\n')).toEqual([
      'Sync completed in 1.23s',
      'Total items: 3',
      'Updated: 1',
      'Failed: 0',
      'Skipped: 2',
      'Success rate: 33.33%',
    ]);
  });

  it('truncates the error list', () => {
    const timestamp = new Date(Date.UTC(2024, 0, 15));
    const errors = ['A', 'B', 'C'].map((identifier) => ({
      identifier,
      kind: 'NotFoundError',
      message: `SKU ${identifier} not found in storefront`,
      timestamp,
    }));

    const lines = formatSummary(outcomeWith({ success: false, total: 3, failedCount: 3, errors }), 2).split('\n');

    expect(lines.slice(6)).toEqual([
      '',
      'Errors (3):',
      '  - A: SKU A not found in storefront',
      '  - B: SKU B not found in storefront',
      '  ... and 1 more errors',
    ]);
  });
});

describe('outcomeToJSON', () => {
  it('serializes dates and rounds the rate', () => {
    const json = outcomeToJSON(outcomeWith({ total: 3, updatedCount: 2, successRate: (2 / 3) * 100 }));

    expect(json).toMatchObject({
      successRate: 66.67,
      startedAt: '2024-01-15T22:00:00.000Z',
      endedAt: '2024-01-15T22:00:01.000Z',
      errors: [],
    });
  });
});
