/**
 * Sync Engine
 * Owns the agents, the event bus and the nightly schedule
 */

import type { Logger } from 'pino';
import type { LedgerOperations, OrderEvent, StorefrontOperations } from '@stockbridge/integrations';
import { SyncEngineEventBus } from './events.js';
import { ReconciliationAgent } from './agents/reconciliation.js';
import { OrderDecrementAgent } from './agents/order.js';
import { NightlyScheduler } from './scheduler.js';
import {
  DEFAULT_ENGINE_CONFIG,
  type AgentState,
  type ConnectionReport,
  type EngineStats,
  type EngineStatus,
  type OrderOutcome,
  type ReconcileOptions,
  type ReconciliationOutcome,
  type SyncEngineConfig,
  type SyncOutcome,
} from './types.js';

// ============================================================================
// Engine Dependencies
// ============================================================================

export interface SyncEngineDependencies {
  ledger: LedgerOperations;
  storefront: StorefrontOperations;
  logger: Logger;
  config?: Partial<SyncEngineConfig>;
  eventBus?: SyncEngineEventBus;
  /** Pacing sleep, replaced in tests */
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Sync Engine Class
// ============================================================================

export class SyncEngine {
  private readonly ledger: LedgerOperations;
  private readonly storefront: StorefrontOperations;
  private readonly logger: Logger;
  private readonly config: SyncEngineConfig;
  private readonly eventBus: SyncEngineEventBus;
  private readonly reconciliationAgent: ReconciliationAgent;
  private readonly orderAgent: OrderDecrementAgent;
  private readonly scheduler: NightlyScheduler;

  private state: AgentState = 'stopped';
  private startedAt: Date | null = null;
  private stats: EngineStats = {
    reconciliationRuns: 0,
    failedReconciliations: 0,
    ordersProcessed: 0,
    failedOrders: 0,
    itemsUpdated: 0,
  };

  constructor(deps: SyncEngineDependencies) {
    this.ledger = deps.ledger;
    this.storefront = deps.storefront;
    this.logger = deps.logger.child({ component: 'sync-engine' });
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...deps.config };
    this.eventBus = deps.eventBus ?? new SyncEngineEventBus(deps.logger);

    this.reconciliationAgent = new ReconciliationAgent({
      ledger: deps.ledger,
      storefront: deps.storefront,
      eventBus: this.eventBus,
      logger: deps.logger,
      config: this.config,
      sleep: deps.sleep,
    });
    this.orderAgent = new OrderDecrementAgent({
      ledger: deps.ledger,
      storefront: deps.storefront,
      eventBus: this.eventBus,
      logger: deps.logger,
    });
    this.scheduler = new NightlyScheduler({
      hour: this.config.nightlyHour,
      minute: this.config.nightlyMinute,
      startupDelayMs: this.config.startupDelayMs,
      job: () => this.runReconciliation(),
      logger: deps.logger,
    });

    this.setupEventListeners();
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  async start(): Promise<void> {
    if (this.state === 'running') {
      this.logger.warn('Engine already running');
      return;
    }

    this.state = 'starting';
    if (this.config.schedulerEnabled) {
      this.scheduler.start();
    }
    this.state = 'running';
    this.startedAt = new Date();

    this.logger.info(
      {
        scheduler: this.config.schedulerEnabled,
        nightlyAt: `${String(this.config.nightlyHour).padStart(2, '0')}:${String(this.config.nightlyMinute).padStart(2, '0')}`,
      },
      'Sync engine started'
    );
  }

  /**
   * Stop scheduling, wait for a running reconciliation, then close the ledger session
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }

    this.state = 'stopping';
    try {
      await this.scheduler.stop();
      await this.ledger.logout();
      this.state = 'stopped';
      this.startedAt = null;
      this.logger.info('Sync engine stopped');
    } catch (error) {
      this.state = 'error';
      throw error;
    }
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  runReconciliation(options: ReconcileOptions = {}): Promise<ReconciliationOutcome> {
    return this.reconciliationAgent.run(options);
  }

  reconcileSku(identifier: string, options: ReconcileOptions = {}): Promise<SyncOutcome> {
    return this.reconciliationAgent.reconcileOne(identifier, options);
  }

  processOrder(order: OrderEvent): Promise<OrderOutcome> {
    return this.orderAgent.processOrder(order);
  }

  /**
   * Start a reconciliation through the scheduler so it never overlaps a scheduled one
   */
  triggerReconciliation(): Promise<boolean> {
    return this.scheduler.trigger('manual');
  }

  async testConnections(): Promise<ConnectionReport> {
    const [ledger, storefront] = await Promise.all([this.ledger.healthCheck(), this.storefront.healthCheck()]);
    return { ledger, storefront };
  }

  // ==========================================================================
  // Status
  // ==========================================================================

  getStatus(): EngineStatus {
    return {
      state: this.state,
      startedAt: this.startedAt,
      uptime: this.startedAt ? Date.now() - this.startedAt.getTime() : 0,
      agents: {
        reconciliation: this.reconciliationAgent.getStatus(),
        order: this.orderAgent.getStatus(),
      },
      scheduler: this.scheduler.getStatus(),
      stats: { ...this.stats },
    };
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  private setupEventListeners(): void {
    this.eventBus.onReconciliationCompleted((event) => {
      this.stats.reconciliationRuns++;
      this.stats.itemsUpdated += event.payload.updatedCount;
      if (!event.payload.success) {
        this.stats.failedReconciliations++;
      }
    });

    this.eventBus.onReconciliationFailed((event) => {
      this.stats.reconciliationRuns++;
      this.stats.failedReconciliations++;
      this.logger.error({ kind: event.payload.kind, error: event.payload.error }, 'Reconciliation aborted');
    });

    this.eventBus.onOrderProcessed((event) => {
      this.stats.ordersProcessed++;
      if (!event.payload.success) {
        this.stats.failedOrders++;
      }
    });
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createSyncEngine(deps: SyncEngineDependencies): SyncEngine {
  return new SyncEngine(deps);
}
