/**
 * Operator CLI Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { ConnectionReport, ReconciliationOutcome, SyncOutcome } from '@stockbridge/sync-engine';
import { runCli, type CliContext } from '../cli.js';
import { loadConfig } from '../config/index.js';

function outcome(overrides: Partial<SyncOutcome> = {}): SyncOutcome {
  return {
    success: true,
    total: 2,
    updatedCount: 1,
    skippedCount: 1,
    failedCount: 0,
    errors: [],
    startedAt: new Date(Date.UTC(2024, 0, 15, 22, 0, 0)),
    endedAt: new Date(Date.UTC(2024, 0, 15, 22, 0, 2)),
    durationMs: 2000,
    successRate: 50,
    metadata: {},
    ...overrides,
  };
}

function setup(syncOverrides: Partial<ReconciliationOutcome> = {}) {
  const engine = {
    runReconciliation: vi.fn(async (): Promise<ReconciliationOutcome> => ({
      ...outcome(syncOverrides),
      readErrors: syncOverrides.readErrors ?? [],
    })),
    reconcileSku: vi.fn(async (): Promise<SyncOutcome> => outcome({ total: 1, skippedCount: 0, successRate: 100 })),
    testConnections: vi.fn(
      async (): Promise<ConnectionReport> => ({ ledger: { success: true }, storefront: { success: true } })
    ),
  };
  const close = vi.fn(async () => undefined);
  const context: CliContext = {
    config: loadConfig({ LEDGER_PASSWORD: 'test-password', STOREFRONT_WEBHOOK_SECRET: 'test-secret' }),
    engine,
    close,
  };
  const out: string[] = [];
  const err: string[] = [];
  const io = { out: (line: string) => out.push(line), err: (line: string) => err.push(line) };
  const run = (...argv: string[]) => runCli(argv, () => context, io);
  return { engine, close, out, err, run };
}

describe('runCli', () => {
  it('runs a full sync and prints the summary', async () => {
    const { engine, close, out, run } = setup();

    expect(await run('sync')).toBe(0);
    expect(engine.runReconciliation).toHaveBeenCalledWith({ dryRun: false });
    expect(out).toEqual([
      'Running full sync...',
      [
        'Sync completed in 2.00s',
        'Total items: 2',
        'Updated: 1',
        'Failed: 0',
        'Skipped: 1',
        'Success rate: 50.00%',
      ].join('\n'),
    ]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('passes --dry-run through', async () => {
    const { engine, run } = setup();

    await run('sync', '--dry-run');

    expect(engine.runReconciliation).toHaveBeenCalledWith({ dryRun: true });
  });

  it('exits 1 and lists the first ten errors of a failed sync', async () => {
    const timestamp = new Date(Date.UTC(2024, 0, 15));
    const errors = Array.from({ length: 12 }, (_, index) => ({
      identifier: `SKU-${index + 1}`,
      kind: 'NotFoundError',
      message: 'not found in storefront',
      timestamp,
    }));
    const { out, run } = setup({ success: false, failedCount: 12, total: 12, errors });

    expect(await run('sync')).toBe(1);

    const lines = out[1].split('\n');
    expect(lines.filter((line) => line.startsWith('  - '))).toHaveLength(10);
    expect(lines[lines.length - 1]).toBe('  ... and 2 more errors');
  });

  it('lists re-read failures with their identifiers, capped at ten', async () => {
    const timestamp = new Date(Date.UTC(2024, 0, 15));
    const readErrors = Array.from({ length: 11 }, (_, index) => ({
      identifier: `SKU-${index + 1}`,
      kind: 'LedgerAPIError',
      message: 'read failed',
      timestamp,
    }));
    const { out, run } = setup({ readErrors });

    expect(await run('sync')).toBe(0);

    const lines = out[2].split('\n');
    expect(lines[0]).toBe('Read errors (11):');
    expect(lines[1]).toBe('  - SKU-1: read failed');
    expect(lines.filter((line) => line.startsWith('  - '))).toHaveLength(10);
    expect(lines[lines.length - 1]).toBe('  ... and 1 more read errors');
  });

  it('syncs a single SKU', async () => {
    const { engine, run } = setup();

    expect(await run('sync-sku', 'ABC-1', '--dry-run')).toBe(0);
    expect(engine.reconcileSku).toHaveBeenCalledWith('ABC-1', { dryRun: true });
  });

  it('requires a SKU for sync-sku', async () => {
    const { engine, err, run } = setup();

    expect(await run('sync-sku')).toBe(1);
    expect(err[0]).toBe('sync-sku requires a SKU');
    expect(engine.reconcileSku).not.toHaveBeenCalled();
  });

  it('reports each connection', async () => {
    const { engine, out, run } = setup();
    engine.testConnections.mockResolvedValueOnce({
      ledger: { success: true },
      storefront: { success: false, error: 'Storefront shop read failed with HTTP 403' },
    });

    expect(await run('test-connection')).toBe(1);
    expect(out).toEqual(['Ledger: OK', 'Storefront: FAILED (Storefront shop read failed with HTTP 403)']);
  });

  it('prints the configuration with secrets masked', async () => {
    const { close, out, run } = setup();

    expect(await run('config-info')).toBe(0);
    expect(out).toContain('Ledger password: test****');
    expect(out).toContain('Webhook secret: test****');
    expect(close).not.toHaveBeenCalled();
  });

  it('exits 1 on an unknown command or option', async () => {
    const { err, run } = setup();

    expect(await run('deploy')).toBe(1);
    expect(err[0]).toBe('Unknown command: deploy');
    expect(await run('sync', '--force')).toBe(1);
  });

  it('prints usage without a command', async () => {
    const { out, run } = setup();

    expect(await run()).toBe(1);
    expect(out[0]).toContain('Usage: stockbridge <command> [options]');
  });

  it('turns a thrown error into exit code 1', async () => {
    const { engine, err, run } = setup();
    engine.runReconciliation.mockRejectedValueOnce(new Error('boom'));

    expect(await run('sync')).toBe(1);
    expect(err).toEqual(['Error: boom']);
  });
});
