import { Decimal } from 'decimal.js';

// Share counts can be fractional (dividend reinvestment) and prices carry cents,
// so keep plenty of significant digits and never switch to exponential notation
// for the magnitudes a brokerage statement produces.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Fixed-width decimal for tabular output, e.g. `formatFixed(d, 3, 10)`.
 */
export function formatFixed(decimal: Decimal, decimalPlaces: number, width = 0): string {
  const text = decimal.isFinite() ? decimal.toFixed(decimalPlaces) : decimal.toString();
  return text.padStart(width);
}

/**
 * Whether the value has no fractional part
 */
export function isWholeNumber(decimal: Decimal): boolean {
  return decimal.isFinite() && decimal.isInteger();
}

/**
 * Sum a list of Decimals (zero for an empty list)
 */
export function sumDecimals(values: readonly Decimal[]): Decimal {
  return values.reduce((sum, value) => sum.plus(value), new Decimal(0));
}
