import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { MissingPriceError } from '../domain/errors.js';
import { getHoldingIds } from '../domain/lot.js';
import type { Lot, PriceTable, SaleCandidate, SaleFigures } from '../domain/types.js';

/**
 * Holdings referenced by the lots that have no price, in first-seen order
 */
export function findMissingPrices(lots: readonly Lot[], prices: PriceTable): string[] {
  return getHoldingIds(lots).filter((holdingId) => !prices.has(holdingId));
}

/**
 * Check every distinct holding up front, so a missing price is reported even
 * for holdings the selection would never reach.
 */
export function validatePriceCoverage(lots: readonly Lot[], prices: PriceTable): Result<void, MissingPriceError> {
  const missing = findMissingPrices(lots, prices);
  if (missing.length > 0) {
    return err(new MissingPriceError(missing));
  }
  return ok(undefined);
}

/**
 * Figures for selling the whole lot at `price`.
 *
 * A zero sale amount (zero shares or zero price) gives a non-finite gain
 * ratio: NaN for 0/0, ±Infinity when there is a gain or loss over nothing.
 */
export function computeSaleFigures(lot: Lot, price: Decimal): SaleFigures {
  const saleAmount = price.times(lot.shares);
  const capitalGain = price.minus(lot.costBasisPerShare).times(lot.shares);
  const gainRatio = capitalGain.div(saleAmount);

  return { saleAmount, capitalGain, gainRatio };
}

/**
 * Sale figures for every lot, in input order
 */
export function buildSaleCandidates(
  lots: readonly Lot[],
  prices: PriceTable
): Result<SaleCandidate[], MissingPriceError> {
  return validatePriceCoverage(lots, prices).andThen(() => {
    const candidates: SaleCandidate[] = [];

    for (const [lotIndex, lot] of lots.entries()) {
      const pricePerShare = prices.get(lot.holdingId);
      // Coverage was checked above; a miss here means the table changed underneath us
      if (pricePerShare === undefined) {
        return err(new MissingPriceError([lot.holdingId]));
      }

      candidates.push({ lot, lotIndex, pricePerShare, figures: computeSaleFigures(lot, pricePerShare) });
    }

    return ok(candidates);
  });
}
