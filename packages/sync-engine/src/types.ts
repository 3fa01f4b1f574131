/**
 * Sync Engine Types
 */

import type { ConnectionCheck } from '@stockbridge/integrations';

// ============================================================================
// Engine & Agent State
// ============================================================================

export type AgentState = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

export type AgentActivity = 'idle' | 'busy';

export interface AgentStatus {
  name: string;
  activity: AgentActivity;
  lastActivity: Date | null;
  processedCount: number;
  errorCount: number;
  error?: string;
}

export interface EngineStats {
  reconciliationRuns: number;
  failedReconciliations: number;
  ordersProcessed: number;
  failedOrders: number;
  itemsUpdated: number;
}

export interface EngineStatus {
  state: AgentState;
  startedAt: Date | null;
  uptime: number;
  agents: {
    reconciliation: AgentStatus;
    order: AgentStatus;
  };
  scheduler: SchedulerStatus;
  stats: EngineStats;
}

export interface SchedulerStatus {
  enabled: boolean;
  running: boolean;
  nextRunAt: Date | null;
  lastRunAt: Date | null;
}

// ============================================================================
// Configuration
// ============================================================================

export interface SyncEngineConfig {
  /** Pause between recalculations during reconciliation */
  recalcPacingMs: number;
  /** Local hour of the nightly run */
  nightlyHour: number;
  nightlyMinute: number;
  /** Delay before the run that follows start-up */
  startupDelayMs: number;
  schedulerEnabled: boolean;
}

export const DEFAULT_ENGINE_CONFIG: SyncEngineConfig = {
  recalcPacingMs: 200,
  nightlyHour: 22,
  nightlyMinute: 0,
  startupDelayMs: 10_000,
  schedulerEnabled: true,
};

// ============================================================================
// Outcomes
// ============================================================================

export type ItemStatus = 'updated' | 'skipped' | 'failed';

export interface SyncErrorEntry {
  identifier: string;
  kind: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: Date;
}

export interface SyncOutcome {
  success: boolean;
  total: number;
  updatedCount: number;
  skippedCount: number;
  failedCount: number;
  errors: SyncErrorEntry[];
  startedAt: Date;
  endedAt: Date;
  durationMs: number;
  /** updated / total * 100 */
  successRate: number;
  metadata: Record<string, unknown>;
}

/** Re-read failures are kept apart from the counted errors */
export interface ReconciliationOutcome extends SyncOutcome {
  readErrors: SyncErrorEntry[];
}

export interface ReconcileOptions {
  /** Compute and count differences without writing to the storefront */
  dryRun?: boolean;
}

export interface OrderLineError {
  sku?: string;
  title?: string;
  kind: string;
  message: string;
}

export interface OrderOutcome {
  success: boolean;
  orderId: string | null;
  orderName: string | null;
  itemsProcessed: number;
  itemsSkipped: number;
  errors: OrderLineError[];
}

export interface ConnectionReport {
  ledger: ConnectionCheck;
  storefront: ConnectionCheck;
}

// ============================================================================
// Events
// ============================================================================

export type SyncEngineEventType =
  | 'reconciliation:completed'
  | 'reconciliation:failed'
  | 'order:processed';

export interface BaseEvent<T extends SyncEngineEventType, P> {
  type: T;
  payload: P;
  timestamp: Date;
}

export type ReconciliationCompletedEvent = BaseEvent<'reconciliation:completed', ReconciliationOutcome>;

export type ReconciliationFailedEvent = BaseEvent<
  'reconciliation:failed',
  { kind: string; error: string; outcome: ReconciliationOutcome }
>;

export type OrderProcessedEvent = BaseEvent<'order:processed', OrderOutcome>;

export type SyncEngineEvent = ReconciliationCompletedEvent | ReconciliationFailedEvent | OrderProcessedEvent;
