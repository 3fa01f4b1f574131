/**
 * Common types shared by the ledger and storefront clients
 */

// ============================================================================
// Ledger Entities
// ============================================================================

/** Product eligible for storefront sync */
export interface LedgerProduct {
  identifier: string;
  displayName: string;
}

export interface StockRecord {
  identifier: string;
  /** Derived server-side from the movement history, always an integer >= 0 */
  computedQuantity: number;
  displayName: string;
  classificationTag: string;
}

/** Signed movement; exactly one side is non-zero */
export interface MovementUnits {
  unitsOut: number;
  unitsIn: number;
}

export interface MovementEntry extends MovementUnits {
  productIdentifier: string;
}

// ============================================================================
// Storefront Entities
// ============================================================================

export interface StorefrontInventoryRecord {
  sku: string;
  availableQuantity: number;
  variantReference: string;
  inventoryItemReference: string;
}

export interface QuantityUpdate {
  sku: string;
  quantity: number;
}

export interface BulkSetError {
  sku: string;
  kind: string;
  message: string;
}

export interface BulkSetResult {
  successCount: number;
  errorCount: number;
  errors: BulkSetError[];
}

// ============================================================================
// Client Contracts
// ============================================================================

export interface ConnectionCheck {
  success: boolean;
  error?: string;
}

export interface LedgerOperations {
  authenticate(forceRefresh?: boolean): Promise<string>;
  listEligibleProducts(): Promise<LedgerProduct[]>;
  getQuantity(identifier: string): Promise<number>;
  getStockRecord(identifier: string): Promise<StockRecord | null>;
  appendMovement(identifier: string, unitsOut: number): Promise<void>;
  recordMovement(identifier: string, movement: MovementUnits): Promise<void>;
  recalculate(identifier: string): Promise<void>;
  healthCheck(): Promise<ConnectionCheck>;
  logout(): Promise<void>;
}

export interface StorefrontOperations {
  getQuantity(sku: string): Promise<StorefrontInventoryRecord | null>;
  setQuantity(sku: string, quantity: number): Promise<void>;
  bulkSet(updates: QuantityUpdate[]): Promise<BulkSetResult>;
  invalidateCache(): void;
  healthCheck(): Promise<ConnectionCheck>;
}
