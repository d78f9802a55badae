import type { Decimal } from 'decimal.js';

import type { SaleCandidate } from '../domain/types.js';

/**
 * Total order over gain ratios:
 *   1. Finite ratios ascending (losses first, then the smallest gain per dollar)
 *   2. Non-finite ratios (NaN, ±Infinity from zero sale amounts) after every finite one
 *
 * Non-finite ratios compare equal to each other, so a stable sort keeps them in
 * input order.
 */
export function compareGainRatios(a: Decimal, b: Decimal): number {
  const aFinite = a.isFinite();
  const bFinite = b.isFinite();

  if (aFinite && bFinite) {
    return a.comparedTo(b);
  }
  if (aFinite) return -1;
  if (bFinite) return 1;
  return 0;
}

/**
 * Rank candidates by ascending gain ratio. Stable: equal ratios keep input order.
 */
export function rankByGainRatio(candidates: readonly SaleCandidate[]): SaleCandidate[] {
  return [...candidates].sort((a, b) => compareGainRatios(a.figures.gainRatio, b.figures.gainRatio));
}

/**
 * Proceeds left after withholding `taxRate` of the realized gain
 */
export function netOfTax(amount: Decimal, capitalGain: Decimal, taxRate: Decimal): Decimal {
  return amount.minus(capitalGain.times(taxRate));
}
