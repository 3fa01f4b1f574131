/**
 * Stock Triad Tests
 */

import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { LedgerAPIError } from '@stockbridge/integrations';
import { StockTriad } from '../triad.js';
import { FakeLedger, FakeStorefront } from '../__mocks__/fakes.js';

const logger = pino({ level: 'silent' });

function setup() {
  const journal: string[] = [];
  const ledger = new FakeLedger(journal);
  const storefront = new FakeStorefront(journal);
  return { journal, ledger, storefront, triad: new StockTriad({ ledger, storefront, logger }) };
}

describe('StockTriad', () => {
  it('pushes the quantity read after recalculation', async () => {
    const { journal, ledger, storefront, triad } = setup();
    ledger.addProduct('A', 10);
    storefront.addSku('A', 10);

    expect(await triad.applyMovementAndPush('A', { unitsOut: 4, unitsIn: 0 })).toBe(6);
    expect(journal).toEqual([
      'ledger.appendMovement:A:4',
      'ledger.recalculate:A',
      'ledger.getQuantity:A',
      'storefront.setQuantity:A:6',
    ]);
  });

  it('records inbound movements in full', async () => {
    const { journal, ledger, storefront, triad } = setup();
    ledger.addProduct('A', 1);
    storefront.addSku('A', 1);

    expect(await triad.applyMovementAndPush('A', { unitsOut: 0, unitsIn: 5 })).toBe(6);
    expect(journal[0]).toBe('ledger.recordMovement:A:0:5');
  });

  it('does not touch the storefront when recalculation fails', async () => {
    const { journal, ledger, storefront, triad } = setup();
    ledger.addProduct('A', 10);
    storefront.addSku('A', 10);
    ledger.failOn('recalculate', 'A', new LedgerAPIError('Failed to recalculate A: HTTP 500'));

    await expect(triad.applyMovementAndPush('A', { unitsOut: 1, unitsIn: 0 })).rejects.toThrow(
      'Failed to recalculate A: HTTP 500'
    );
    expect(journal).toEqual(['ledger.appendMovement:A:1', 'ledger.recalculate:A']);
    expect(storefront.sets).toEqual([]);
  });

  it('refreshes and reads without writing', async () => {
    const { journal, ledger, triad } = setup();
    ledger.addProduct('A', 8, 3);

    expect(await triad.refreshAndRead('A')).toBe(8);
    expect(journal).toEqual(['ledger.recalculate:A', 'ledger.getQuantity:A']);
  });
});
