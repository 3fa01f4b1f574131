/**
 * StockBridge - Sync Engine
 * Keeps storefront quantities in line with the ledger
 *
 * Agents:
 * - Reconciliation Agent: full or single-product comparison against the storefront
 * - Order Decrement Agent: applies paid orders to the ledger and pushes the result
 *
 * @packageDocumentation
 */

// ============================================================================
// Main Engine
// ============================================================================

export { SyncEngine, createSyncEngine, type SyncEngineDependencies } from './engine.js';

// ============================================================================
// Agents
// ============================================================================

export {
  ReconciliationAgent,
  createReconciliationAgent,
  type ReconciliationAgentDependencies,
  OrderDecrementAgent,
  createOrderDecrementAgent,
  type OrderAgentDependencies,
} from './agents/index.js';

export { StockTriad, type StockTriadDependencies } from './triad.js';

export {
  NightlyScheduler,
  createNightlyScheduler,
  msUntilNextRun,
  type NightlySchedulerOptions,
  type TriggerReason,
} from './scheduler.js';

// ============================================================================
// Results
// ============================================================================

export {
  SyncResultAggregator,
  SYSTEM_IDENTIFIER,
  formatSummary,
  outcomeToJSON,
  toErrorEntry,
  type SyncResultAggregatorOptions,
} from './results.js';

// ============================================================================
// Event Bus
// ============================================================================

export { SyncEngineEventBus, createEventBus, type SyncEngineEventMap } from './events.js';

// ============================================================================
// Types
// ============================================================================

export { DEFAULT_ENGINE_CONFIG } from './types.js';

export type {
  AgentState,
  AgentActivity,
  AgentStatus,
  EngineStats,
  EngineStatus,
  SchedulerStatus,
  SyncEngineConfig,
  ItemStatus,
  SyncErrorEntry,
  SyncOutcome,
  ReconciliationOutcome,
  ReconcileOptions,
  OrderLineError,
  OrderOutcome,
  ConnectionReport,
  SyncEngineEventType,
  SyncEngineEvent,
  ReconciliationCompletedEvent,
  ReconciliationFailedEvent,
  OrderProcessedEvent,
} from './types.js';
