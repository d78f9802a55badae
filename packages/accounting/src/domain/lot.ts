import { fromZod, formatZodIssues } from '@lotwise/core';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { LotSchema, PriceTableSchema } from './schemas.js';
import type { Lot, PriceTable } from './types.js';

/**
 * Create a validated lot
 */
export function createLot(params: {
  costBasisPerShare: Decimal;
  holdingId: string;
  purchaseDate: Date;
  shares: Decimal;
}): Result<Lot, Error> {
  return fromZod(LotSchema, params)
    .map((lot): Lot => Object.freeze({ ...lot }))
    .mapErr((error) => new Error(`Invalid lot: ${formatZodIssues(error).join('; ')}`));
}

/**
 * Build a price table from holding/price pairs. A later entry for the same
 * holding replaces an earlier one.
 */
export function createPriceTable(entries: Iterable<readonly [string, Decimal]>): Result<PriceTable, Error> {
  const prices = new Map<string, Decimal>();
  for (const [holdingId, price] of entries) {
    prices.set(holdingId, price);
  }

  const parsed = PriceTableSchema.safeParse(prices);
  if (!parsed.success) {
    return err(new Error(`Invalid price table: ${formatZodIssues(parsed.error).join('; ')}`));
  }
  return ok(parsed.data);
}

/**
 * Distinct holding ids in first-seen order
 */
export function getHoldingIds(lots: readonly Lot[]): string[] {
  return [...new Set(lots.map((lot) => lot.holdingId))];
}
