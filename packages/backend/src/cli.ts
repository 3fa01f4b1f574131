/**
 * Operator CLI
 *
 *   stockbridge sync [--dry-run]
 *   stockbridge sync-sku <sku> [--dry-run]
 *   stockbridge test-connection
 *   stockbridge config-info
 */

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import pino from 'pino';
import { errorMessage } from '@stockbridge/integrations';
import { formatSummary, type SyncEngine, type SyncErrorEntry } from '@stockbridge/sync-engine';
import { describeConfig, loadConfig, type AppConfig } from './config/index.js';
import { createServices } from './container.js';

export const CLI_ERROR_LIMIT = 10;

export const USAGE = [
  'Usage: stockbridge <command> [options]',
  '',
  'Commands:',
  '  sync [--dry-run]            Reconcile every eligible product',
  '  sync-sku <sku> [--dry-run]  Reconcile a single product',
  '  test-connection             Check both upstream systems',
  '  config-info                 Print the configuration, secrets masked',
].join('\n');

export function formatReadErrors(errors: SyncErrorEntry[], limit: number): string {
  const lines = [`Read errors (${errors.length}):`];
  for (const error of errors.slice(0, limit)) {
    lines.push(`  - ${error.identifier}: ${error.message}`);
  }
  if (errors.length > limit) {
    lines.push(`  ... and ${errors.length - limit} more read errors`);
  }
  return lines.join('\n');
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliContext {
  config: AppConfig;
  engine: Pick<SyncEngine, 'runReconciliation' | 'reconcileSku' | 'testConnections'>;
  /** Release upstream sessions */
  close: () => Promise<void>;
}

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Run one command and resolve to the process exit code
 */
export async function runCli(
  argv: string[],
  context: () => CliContext,
  io: CliIO = defaultIO
): Promise<number> {
  let parsed: ReturnType<typeof parseCommand>;
  try {
    parsed = parseCommand(argv);
  } catch (error) {
    io.err(errorMessage(error));
    io.err(USAGE);
    return 1;
  }

  const { command, positionals, dryRun } = parsed;
  if (!command || command === 'help') {
    io.out(USAGE);
    return command ? 0 : 1;
  }

  let ctx: CliContext;
  try {
    ctx = context();
  } catch (error) {
    io.err(`Configuration error: ${errorMessage(error)}`);
    return 1;
  }

  try {
    switch (command) {
      case 'sync': {
        io.out(dryRun ? 'Running full sync (dry run)...' : 'Running full sync...');
        const outcome = await ctx.engine.runReconciliation({ dryRun });
        io.out(formatSummary(outcome, CLI_ERROR_LIMIT));
        if (outcome.readErrors.length > 0) {
          io.out(formatReadErrors(outcome.readErrors, CLI_ERROR_LIMIT));
        }
        return outcome.success ? 0 : 1;
      }

      case 'sync-sku': {
        const [sku] = positionals;
        if (!sku) {
          io.err('sync-sku requires a SKU');
          io.err(USAGE);
          return 1;
        }
        io.out(`Syncing ${sku}${dryRun ? ' (dry run)' : ''}...`);
        const outcome = await ctx.engine.reconcileSku(sku, { dryRun });
        io.out(formatSummary(outcome, CLI_ERROR_LIMIT));
        return outcome.success ? 0 : 1;
      }

      case 'test-connection': {
        const report = await ctx.engine.testConnections();
        io.out(`Ledger: ${report.ledger.success ? 'OK' : `FAILED (${report.ledger.error ?? 'unknown error'})`}`);
        io.out(
          `Storefront: ${report.storefront.success ? 'OK' : `FAILED (${report.storefront.error ?? 'unknown error'})`}`
        );
        return report.ledger.success && report.storefront.success ? 0 : 1;
      }

      case 'config-info': {
        for (const [label, value] of describeConfig(ctx.config)) {
          io.out(`${label}: ${value}`);
        }
        return 0;
      }

      default:
        io.err(`Unknown command: ${command}`);
        io.err(USAGE);
        return 1;
    }
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    if (command !== 'config-info') {
      await ctx.close().catch((error: unknown) => io.err(`Error during cleanup: ${errorMessage(error)}`));
    }
  }
}

function parseCommand(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      'dry-run': { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const [command, ...rest] = positionals;
  return { command, positionals: rest, dryRun: values['dry-run'] === true };
}

function createCliContext(): CliContext {
  const config = loadConfig();
  const logger = pino({ level: process.env.LOG_LEVEL ?? 'warn' });
  const { engine, ledger } = createServices(config, { logger, schedulerEnabled: false });
  return { config, engine, close: () => ledger.logout() };
}

if (process.argv[1] && fileURLToPath(import.meta.url) === path.resolve(process.argv[1])) {
  runCli(process.argv.slice(2), createCliContext).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(errorMessage(error));
      process.exit(1);
    }
  );
}
