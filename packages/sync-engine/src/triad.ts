/**
 * Stock Triad
 * Ledger write, ledger recalculation, storefront push - always in that order.
 */

import type { Logger } from 'pino';
import type { LedgerOperations, MovementUnits, StorefrontOperations } from '@stockbridge/integrations';

export interface StockTriadDependencies {
  ledger: LedgerOperations;
  storefront: StorefrontOperations;
  logger: Logger;
}

export class StockTriad {
  private readonly ledger: LedgerOperations;
  private readonly storefront: StorefrontOperations;
  private readonly logger: Logger;

  constructor(deps: StockTriadDependencies) {
    this.ledger = deps.ledger;
    this.storefront = deps.storefront;
    this.logger = deps.logger.child({ component: 'triad' });
  }

  /**
   * Recalculate the stored quantity, then read it back
   */
  async refreshAndRead(identifier: string): Promise<number> {
    await this.ledger.recalculate(identifier);
    return this.ledger.getQuantity(identifier);
  }

  /**
   * Record a movement and push the recalculated quantity to the storefront.
   * Resolves to the quantity that was pushed.
   */
  async applyMovementAndPush(identifier: string, movement: MovementUnits): Promise<number> {
    if (movement.unitsIn === 0) {
      await this.ledger.appendMovement(identifier, movement.unitsOut);
    } else {
      await this.ledger.recordMovement(identifier, movement);
    }

    const quantity = await this.refreshAndRead(identifier);
    await this.storefront.setQuantity(identifier, quantity);

    this.logger.debug({ identifier, ...movement, quantity }, 'Movement applied and pushed');
    return quantity;
  }
}
