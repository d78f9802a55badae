import type { Decimal } from 'decimal.js';

/**
 * One line of the sale summary
 */
export interface SelectionReportRow {
  purchaseDate: Date;
  holdingId: string;
  saleAmount: Decimal;
  capitalGain: Decimal;
  gainRatio: Decimal;
  sharesSold: Decimal;
  /** Share count has no fractional part (uncommon for reinvested lots) */
  wholeShares: boolean;
  /** Only part of the lot is sold */
  isPartial: boolean;
}

/**
 * Sale summary in presentation order (most recent purchase first)
 */
export interface SelectionReport {
  rows: SelectionReportRow[];
  target: Decimal;
  taxRate: Decimal;
  totalAmount: Decimal;
  totalCapitalGain: Decimal;
  /** Present only when a non-zero tax rate was applied */
  taxes?: Decimal | undefined;
  /** Present only when a non-zero tax rate was applied */
  netAmount?: Decimal | undefined;
}
