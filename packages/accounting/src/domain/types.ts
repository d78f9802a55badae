import type { Decimal } from 'decimal.js';

/**
 * A single purchase of shares. Lots are never mutated; a lot is identified by
 * its position in the portfolio's lot list.
 */
export interface Lot {
  readonly purchaseDate: Date;
  /** Fund or security the shares belong to */
  readonly holdingId: string;
  /** May be fractional (reinvested dividends) */
  readonly shares: Decimal;
  readonly costBasisPerShare: Decimal;
}

/**
 * Current price per share, keyed by holding id
 */
export type PriceTable = ReadonlyMap<string, Decimal>;

/**
 * Figures for selling a whole lot at the current price
 */
export interface SaleFigures {
  /** price × shares */
  saleAmount: Decimal;
  /** (price − cost basis) × shares; negative for a loss */
  capitalGain: Decimal;
  /** capitalGain / saleAmount, non-finite when saleAmount is zero */
  gainRatio: Decimal;
}

/**
 * A lot paired with its price and derived sale figures for one selection run
 */
export interface SaleCandidate {
  lot: Lot;
  /** Position of the lot in the caller's input */
  lotIndex: number;
  pricePerShare: Decimal;
  figures: SaleFigures;
}

/**
 * A lot chosen for sale, whole or split down to a whole-share subset
 */
export interface SelectedLot {
  /** The original lot, untouched even when only part of it is sold */
  lot: Lot;
  lotIndex: number;
  sharesSold: Decimal;
  pricePerShare: Decimal;
  saleAmount: Decimal;
  capitalGain: Decimal;
  gainRatio: Decimal;
  isPartial: boolean;
}

/**
 * Lots to sell, in ranking order, with run totals
 */
export interface SelectionResult {
  selections: SelectedLot[];
  target: Decimal;
  taxRate: Decimal;
  totalAmount: Decimal;
  totalCapitalGain: Decimal;
  /** totalCapitalGain × taxRate */
  totalTax: Decimal;
  /** totalAmount − totalTax */
  netAmount: Decimal;
}
