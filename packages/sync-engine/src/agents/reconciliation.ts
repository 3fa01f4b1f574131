/**
 * Reconciliation Agent
 * Brings every eligible storefront quantity in line with the ledger.
 *
 * A run has four phases:
 *   1. list the eligible products
 *   2. recalculate each one in the ledger, paced
 *   3. re-read every computed quantity
 *   4. compare against the storefront and set whatever differs
 */

import type { Logger } from 'pino';
import {
  NotFoundError,
  errorKind,
  errorMessage,
  sleep as defaultSleep,
  type LedgerOperations,
  type LedgerProduct,
  type StorefrontOperations,
} from '@stockbridge/integrations';
import type { SyncEngineEventBus } from '../events.js';
import { StockTriad } from '../triad.js';
import { SyncResultAggregator, toErrorEntry } from '../results.js';
import type {
  AgentActivity,
  AgentStatus,
  ItemStatus,
  ReconcileOptions,
  ReconciliationOutcome,
  SyncEngineConfig,
  SyncErrorEntry,
  SyncOutcome,
} from '../types.js';

// ============================================================================
// Constants
// ============================================================================

const AGENT_NAME = 'reconciliation';

// ============================================================================
// Reconciliation Agent Dependencies
// ============================================================================

export interface ReconciliationAgentDependencies {
  ledger: LedgerOperations;
  storefront: StorefrontOperations;
  eventBus: SyncEngineEventBus;
  logger: Logger;
  config: Pick<SyncEngineConfig, 'recalcPacingMs'>;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

// ============================================================================
// Reconciliation Agent Class
// ============================================================================

export class ReconciliationAgent {
  private readonly ledger: LedgerOperations;
  private readonly storefront: StorefrontOperations;
  private readonly eventBus: SyncEngineEventBus;
  private readonly logger: Logger;
  private readonly config: Pick<SyncEngineConfig, 'recalcPacingMs'>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly triad: StockTriad;

  private activity: AgentActivity = 'idle';
  private processedCount = 0;
  private errorCount = 0;
  private lastActivity: Date | null = null;
  private lastError: string | undefined;

  constructor(deps: ReconciliationAgentDependencies) {
    this.ledger = deps.ledger;
    this.storefront = deps.storefront;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger.child({ component: AGENT_NAME });
    this.config = deps.config;
    this.sleep = deps.sleep ?? defaultSleep;
    this.clock = deps.clock ?? (() => new Date());
    this.triad = new StockTriad({ ledger: deps.ledger, storefront: deps.storefront, logger: deps.logger });
  }

  /**
   * Reconcile every eligible product
   */
  async run(options: ReconcileOptions = {}): Promise<ReconciliationOutcome> {
    const dryRun = options.dryRun ?? false;
    const aggregator = new SyncResultAggregator({ clock: this.clock, metadata: { mode: 'full', dryRun } });
    this.activity = 'busy';

    try {
      const products = await this.listProducts(aggregator);
      if (!products) {
        const outcome: ReconciliationOutcome = { ...aggregator.finalize(), readErrors: [] };
        const [systemError] = outcome.errors;
        this.noteFailure(systemError?.message);
        this.eventBus.emitReconciliationFailed({
          kind: systemError?.kind ?? 'Error',
          error: systemError?.message ?? 'Reconciliation aborted',
          outcome,
        });
        return outcome;
      }

      aggregator.setTotal(products.length);
      this.logger.info({ count: products.length, dryRun }, 'Reconciliation started');

      await this.recalculateAll(products, aggregator);
      const { quantities, readErrors } = await this.readAll(products);

      this.storefront.invalidateCache();
      for (const product of products) {
        const quantity = quantities.get(product.identifier);
        if (quantity === undefined) {
          continue;
        }
        try {
          aggregator.record(product.identifier, await this.applyQuantity(product.identifier, quantity, dryRun));
        } catch (error) {
          // An item whose recalculation already failed keeps that count; the error is still kept
          aggregator.fail(product.identifier, error);
          this.logger.error(
            { identifier: product.identifier, error: errorMessage(error) },
            'Failed to apply quantity'
          );
        }
      }

      const outcome: ReconciliationOutcome = { ...aggregator.finalize(), readErrors };
      this.processedCount += outcome.total;
      if (!outcome.success) {
        this.noteFailure(outcome.errors[outcome.errors.length - 1]?.message);
      }

      this.logger.info(
        {
          total: outcome.total,
          updated: outcome.updatedCount,
          skipped: outcome.skippedCount,
          failed: outcome.failedCount,
          readErrors: readErrors.length,
          durationMs: outcome.durationMs,
        },
        'Reconciliation completed'
      );
      this.eventBus.emitReconciliationCompleted(outcome);
      return outcome;
    } finally {
      this.activity = 'idle';
      this.lastActivity = this.clock();
    }
  }

  /**
   * Reconcile a single product
   */
  async reconcileOne(identifier: string, options: ReconcileOptions = {}): Promise<SyncOutcome> {
    const dryRun = options.dryRun ?? false;
    const aggregator = new SyncResultAggregator({
      clock: this.clock,
      metadata: { mode: 'single', identifier, dryRun },
    });
    aggregator.setTotal(1);
    this.activity = 'busy';

    try {
      const record = await this.ledger.getStockRecord(identifier);
      if (!record) {
        throw new NotFoundError(`Product ${identifier} not found in ledger`, { identifier });
      }
      const quantity = await this.triad.refreshAndRead(identifier);
      aggregator.record(identifier, await this.applyQuantity(identifier, quantity, dryRun));
    } catch (error) {
      aggregator.fail(identifier, error);
      this.noteFailure(errorMessage(error));
      this.logger.error({ identifier, error: errorMessage(error) }, 'Single product reconciliation failed');
    } finally {
      this.activity = 'idle';
      this.lastActivity = this.clock();
    }

    this.processedCount++;
    return aggregator.finalize();
  }

  /**
   * Get agent status
   */
  getStatus(): AgentStatus {
    return {
      name: AGENT_NAME,
      activity: this.activity,
      lastActivity: this.lastActivity,
      processedCount: this.processedCount,
      errorCount: this.errorCount,
      error: this.lastError,
    };
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private async listProducts(aggregator: SyncResultAggregator): Promise<LedgerProduct[] | null> {
    try {
      return await this.ledger.listEligibleProducts();
    } catch (error) {
      aggregator.failSystem(error);
      this.logger.error({ kind: errorKind(error), error: errorMessage(error) }, 'Could not list eligible products');
      return null;
    }
  }

  private async recalculateAll(products: LedgerProduct[], aggregator: SyncResultAggregator): Promise<void> {
    for (const [index, product] of products.entries()) {
      try {
        await this.ledger.recalculate(product.identifier);
      } catch (error) {
        aggregator.fail(product.identifier, error);
        this.logger.warn({ identifier: product.identifier, error: errorMessage(error) }, 'Recalculation failed');
      }

      if (this.config.recalcPacingMs > 0 && index < products.length - 1) {
        await this.sleep(this.config.recalcPacingMs);
      }
    }
  }

  private async readAll(
    products: LedgerProduct[]
  ): Promise<{ quantities: Map<string, number>; readErrors: SyncErrorEntry[] }> {
    const quantities = new Map<string, number>();
    const readErrors: SyncErrorEntry[] = [];

    for (const product of products) {
      try {
        quantities.set(product.identifier, await this.ledger.getQuantity(product.identifier));
      } catch (error) {
        readErrors.push(toErrorEntry(product.identifier, error, this.clock()));
        this.logger.warn({ identifier: product.identifier, error: errorMessage(error) }, 'Quantity re-read failed');
      }
    }

    return { quantities, readErrors };
  }

  private async applyQuantity(identifier: string, quantity: number, dryRun: boolean): Promise<ItemStatus> {
    const current = await this.storefront.getQuantity(identifier);
    if (!current) {
      throw new NotFoundError(`SKU ${identifier} not found in storefront`, { sku: identifier });
    }

    if (current.availableQuantity === quantity) {
      return 'skipped';
    }

    if (dryRun) {
      this.logger.info(
        { identifier, from: current.availableQuantity, to: quantity },
        'Dry run: quantity would be updated'
      );
      return 'updated';
    }

    await this.storefront.setQuantity(identifier, quantity);
    this.logger.debug({ identifier, from: current.availableQuantity, to: quantity }, 'Quantity updated');
    return 'updated';
  }

  private noteFailure(message: string | undefined): void {
    this.errorCount++;
    this.lastError = message;
  }
}

export function createReconciliationAgent(deps: ReconciliationAgentDependencies): ReconciliationAgent {
  return new ReconciliationAgent(deps);
}
