/**
 * In-memory ledger and storefront used by the engine tests.
 * Both append to a shared journal so call order can be asserted.
 */

import {
  NotFoundError,
  type BulkSetResult,
  type ConnectionCheck,
  type LedgerOperations,
  type LedgerProduct,
  type MovementUnits,
  type QuantityUpdate,
  type StockRecord,
  type StorefrontInventoryRecord,
  type StorefrontOperations,
} from '@stockbridge/integrations';

type Failures = Map<string, Error>;

function failureKey(method: string, identifier: string): string {
  return `${method}:${identifier}`;
}

export class FakeLedger implements LedgerOperations {
  /** Quantity derived from the movements */
  readonly computed = new Map<string, number>();
  /** Quantity returned by reads, refreshed by recalculate */
  readonly stored = new Map<string, number>();
  readonly products: LedgerProduct[] = [];
  readonly failures: Failures = new Map();
  authError: Error | null = null;
  /** Holds authenticate until resolved */
  authGate: Promise<void> | null = null;
  listError: Error | null = null;

  constructor(readonly journal: string[] = []) {}

  addProduct(identifier: string, computed: number, stored = computed): this {
    this.products.push({ identifier, displayName: `Product ${identifier}` });
    this.computed.set(identifier, computed);
    this.stored.set(identifier, stored);
    return this;
  }

  failOn(method: keyof LedgerOperations, identifier: string, error: Error): this {
    this.failures.set(failureKey(method, identifier), error);
    return this;
  }

  async authenticate(): Promise<string> {
    this.journal.push('ledger.authenticate');
    if (this.authGate) await this.authGate;
    if (this.authError) throw this.authError;
    return 'test-token';
  }

  async listEligibleProducts(): Promise<LedgerProduct[]> {
    this.journal.push('ledger.listEligibleProducts');
    if (this.listError) throw this.listError;
    return [...this.products];
  }

  async getQuantity(identifier: string): Promise<number> {
    this.journal.push(`ledger.getQuantity:${identifier}`);
    this.throwIfFailing('getQuantity', identifier);
    const quantity = this.stored.get(identifier);
    if (quantity === undefined) {
      throw new NotFoundError(`Product ${identifier} not found in ledger`);
    }
    return quantity;
  }

  async getStockRecord(identifier: string): Promise<StockRecord | null> {
    this.journal.push(`ledger.getStockRecord:${identifier}`);
    this.throwIfFailing('getStockRecord', identifier);
    const quantity = this.stored.get(identifier);
    if (quantity === undefined) return null;
    return { identifier, computedQuantity: quantity, displayName: `Product ${identifier}`, classificationTag: '8' };
  }

  async appendMovement(identifier: string, unitsOut: number): Promise<void> {
    this.journal.push(`ledger.appendMovement:${identifier}:${unitsOut}`);
    this.throwIfFailing('appendMovement', identifier);
    this.computed.set(identifier, (this.computed.get(identifier) ?? 0) - unitsOut);
  }

  async recordMovement(identifier: string, movement: MovementUnits): Promise<void> {
    this.journal.push(`ledger.recordMovement:${identifier}:${movement.unitsOut}:${movement.unitsIn}`);
    this.throwIfFailing('recordMovement', identifier);
    this.computed.set(identifier, (this.computed.get(identifier) ?? 0) - movement.unitsOut + movement.unitsIn);
  }

  async recalculate(identifier: string): Promise<void> {
    this.journal.push(`ledger.recalculate:${identifier}`);
    this.throwIfFailing('recalculate', identifier);
    const computed = this.computed.get(identifier);
    if (computed !== undefined) {
      this.stored.set(identifier, computed);
    }
  }

  async healthCheck(): Promise<ConnectionCheck> {
    return this.authError ? { success: false, error: this.authError.message } : { success: true };
  }

  async logout(): Promise<void> {
    this.journal.push('ledger.logout');
  }

  private throwIfFailing(method: string, identifier: string): void {
    const error = this.failures.get(failureKey(method, identifier));
    if (error) throw error;
  }
}

export class FakeStorefront implements StorefrontOperations {
  readonly levels = new Map<string, number>();
  readonly failures: Failures = new Map();
  readonly sets: QuantityUpdate[] = [];
  cacheInvalidations = 0;
  healthError: Error | null = null;

  constructor(readonly journal: string[] = []) {}

  addSku(sku: string, available: number): this {
    this.levels.set(sku, available);
    return this;
  }

  failOn(method: 'getQuantity' | 'setQuantity', sku: string, error: Error): this {
    this.failures.set(failureKey(method, sku), error);
    return this;
  }

  async getQuantity(sku: string): Promise<StorefrontInventoryRecord | null> {
    this.journal.push(`storefront.getQuantity:${sku}`);
    this.throwIfFailing('getQuantity', sku);
    const available = this.levels.get(sku);
    if (available === undefined) return null;
    return {
      sku,
      availableQuantity: available,
      variantReference: `variant-${sku}`,
      inventoryItemReference: `item-${sku}`,
    };
  }

  async setQuantity(sku: string, quantity: number): Promise<void> {
    this.journal.push(`storefront.setQuantity:${sku}:${quantity}`);
    this.throwIfFailing('setQuantity', sku);
    if (!this.levels.has(sku)) {
      throw new NotFoundError(`SKU ${sku} not found in storefront`, { sku });
    }
    this.sets.push({ sku, quantity });
    this.levels.set(sku, quantity);
  }

  async bulkSet(updates: QuantityUpdate[]): Promise<BulkSetResult> {
    const result: BulkSetResult = { successCount: 0, errorCount: 0, errors: [] };
    for (const update of updates) {
      try {
        await this.setQuantity(update.sku, update.quantity);
        result.successCount++;
      } catch (error) {
        result.errorCount++;
        result.errors.push({
          sku: update.sku,
          kind: 'NotFoundError',
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return result;
  }

  invalidateCache(): void {
    this.journal.push('storefront.invalidateCache');
    this.cacheInvalidations++;
  }

  async healthCheck(): Promise<ConnectionCheck> {
    return this.healthError ? { success: false, error: this.healthError.message } : { success: true };
  }

  private throwIfFailing(method: string, sku: string): void {
    const error = this.failures.get(failureKey(method, sku));
    if (error) throw error;
  }
}
