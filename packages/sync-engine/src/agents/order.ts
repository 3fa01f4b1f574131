/**
 * Order Decrement Agent
 * Turns a paid order into stock-out movements and pushes the
 * recalculated quantities back to the storefront.
 */

import type { Logger } from 'pino';
import {
  errorKind,
  errorMessage,
  type LedgerOperations,
  type OrderEvent,
  type StorefrontOperations,
} from '@stockbridge/integrations';
import type { SyncEngineEventBus } from '../events.js';
import { StockTriad } from '../triad.js';
import type { AgentStatus, OrderOutcome } from '../types.js';

const AGENT_NAME = 'order';

export interface OrderAgentDependencies {
  ledger: LedgerOperations;
  storefront: StorefrontOperations;
  eventBus: SyncEngineEventBus;
  logger: Logger;
}

export class OrderDecrementAgent {
  private readonly ledger: LedgerOperations;
  private readonly eventBus: SyncEngineEventBus;
  private readonly logger: Logger;
  private readonly triad: StockTriad;

  private inFlight = 0;
  private processedCount = 0;
  private errorCount = 0;
  private lastActivity: Date | null = null;
  private lastError: string | undefined;

  constructor(deps: OrderAgentDependencies) {
    this.ledger = deps.ledger;
    this.eventBus = deps.eventBus;
    this.logger = deps.logger.child({ component: AGENT_NAME });
    this.triad = new StockTriad({ ledger: deps.ledger, storefront: deps.storefront, logger: deps.logger });
  }

  /**
   * Apply every line of an order. Line failures are collected, never thrown.
   * The ledger is only contacted when at least one line can be applied.
   */
  async processOrder(order: OrderEvent): Promise<OrderOutcome> {
    const log = this.logger.child({ orderId: order.orderId, orderName: order.orderName });
    const outcome: OrderOutcome = {
      success: false,
      orderId: order.orderId,
      orderName: order.orderName,
      itemsProcessed: 0,
      itemsSkipped: 0,
      errors: [],
    };
    this.inFlight++;

    try {
      log.info({ lines: order.lineItems.length }, 'Processing order');

      const applicable = order.lineItems.filter((item) => {
        if (item.sku && item.quantity > 0) {
          return true;
        }
        outcome.itemsSkipped++;
        log.warn({ sku: item.sku, title: item.title, quantity: item.quantity }, 'Skipping line item');
        return false;
      });

      if (applicable.length === 0) {
        return this.finish(outcome);
      }

      try {
        await this.ledger.authenticate();
      } catch (error) {
        outcome.errors.push({ kind: errorKind(error), message: errorMessage(error) });
        log.error({ error: errorMessage(error) }, 'Ledger authentication failed, order not applied');
        return this.finish(outcome);
      }

      for (const item of applicable) {
        try {
          const quantity = await this.triad.applyMovementAndPush(item.sku, {
            unitsOut: item.quantity,
            unitsIn: 0,
          });
          outcome.itemsProcessed++;
          log.info({ sku: item.sku, sold: item.quantity, quantity }, 'Line item applied');
        } catch (error) {
          outcome.errors.push({
            sku: item.sku,
            title: item.title,
            kind: errorKind(error),
            message: errorMessage(error),
          });
          log.error({ sku: item.sku, error: errorMessage(error) }, 'Line item failed');
        }
      }

      return this.finish(outcome);
    } finally {
      this.inFlight--;
      this.lastActivity = new Date();
    }
  }

  getStatus(): AgentStatus {
    return {
      name: AGENT_NAME,
      activity: this.inFlight > 0 ? 'busy' : 'idle',
      lastActivity: this.lastActivity,
      processedCount: this.processedCount,
      errorCount: this.errorCount,
      error: this.lastError,
    };
  }

  private finish(outcome: OrderOutcome): OrderOutcome {
    outcome.success = outcome.errors.length === 0;
    this.processedCount++;
    if (!outcome.success) {
      this.errorCount++;
      this.lastError = outcome.errors[outcome.errors.length - 1]?.message;
    }
    this.eventBus.emitOrderProcessed(outcome);
    return outcome;
  }
}

export function createOrderDecrementAgent(deps: OrderAgentDependencies): OrderDecrementAgent {
  return new OrderDecrementAgent(deps);
}
