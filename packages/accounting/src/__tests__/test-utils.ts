import { Decimal } from 'decimal.js';

import type { Lot, PriceTable } from '../domain/types.js';

/**
 * Creates a Lot directly (no validation, so zero-share edge cases are possible)
 */
export function createTestLot(
  holdingId: string,
  shares: string,
  costBasisPerShare: string,
  purchaseDate = '2020-01-15'
): Lot {
  return {
    purchaseDate: new Date(`${purchaseDate}T00:00:00Z`),
    holdingId,
    shares: new Decimal(shares),
    costBasisPerShare: new Decimal(costBasisPerShare),
  };
}

/**
 * Creates a PriceTable from a plain record of holding → price strings
 */
export function createTestPrices(prices: Record<string, string>): PriceTable {
  return new Map(Object.entries(prices).map(([holdingId, price]) => [holdingId, new Decimal(price)]));
}
