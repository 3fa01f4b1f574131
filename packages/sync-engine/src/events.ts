/**
 * Sync Engine Event Bus
 * Typed EventEmitter the agents report through
 */

import EventEmitter from 'eventemitter3';
import type { Logger } from 'pino';
import type {
  SyncEngineEvent,
  ReconciliationCompletedEvent,
  ReconciliationFailedEvent,
  OrderProcessedEvent,
  ReconciliationOutcome,
  OrderOutcome,
} from './types.js';

// ============================================================================
// Event Type Mapping
// ============================================================================

export interface SyncEngineEventMap {
  'reconciliation:completed': (event: ReconciliationCompletedEvent) => void;
  'reconciliation:failed': (event: ReconciliationFailedEvent) => void;
  'order:processed': (event: OrderProcessedEvent) => void;
}

// ============================================================================
// Typed Event Bus
// ============================================================================

export class SyncEngineEventBus extends EventEmitter<SyncEngineEventMap> {
  private readonly logger?: Logger;

  constructor(logger?: Logger) {
    super();
    this.logger = logger?.child({ component: 'event-bus' });
  }

  /**
   * Emit a reconciliation completed event
   */
  emitReconciliationCompleted(payload: ReconciliationOutcome): void {
    const event: ReconciliationCompletedEvent = {
      type: 'reconciliation:completed',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('reconciliation:completed', event);
  }

  /**
   * Emit a reconciliation failed event, raised when a run aborts before any item is processed
   */
  emitReconciliationFailed(payload: ReconciliationFailedEvent['payload']): void {
    const event: ReconciliationFailedEvent = {
      type: 'reconciliation:failed',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('reconciliation:failed', event);
  }

  emitOrderProcessed(payload: OrderOutcome): void {
    const event: OrderProcessedEvent = {
      type: 'order:processed',
      payload,
      timestamp: new Date(),
    };
    this.log(event);
    this.emit('order:processed', event);
  }

  onReconciliationCompleted(listener: (event: ReconciliationCompletedEvent) => void): this {
    return this.on('reconciliation:completed', listener);
  }

  onReconciliationFailed(listener: (event: ReconciliationFailedEvent) => void): this {
    return this.on('reconciliation:failed', listener);
  }

  onOrderProcessed(listener: (event: OrderProcessedEvent) => void): this {
    return this.on('order:processed', listener);
  }

  private log(event: SyncEngineEvent): void {
    this.logger?.debug({ event: event.type }, 'Event emitted');
  }
}

// ============================================================================
// Factory Function
// ============================================================================

export function createEventBus(logger?: Logger): SyncEngineEventBus {
  return new SyncEngineEventBus(logger);
}
