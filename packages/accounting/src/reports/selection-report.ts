import { isWholeNumber, sumDecimals } from '@lotwise/core';

import type { SelectionResult } from '../domain/types.js';

import type { SelectionReport, SelectionReportRow } from './types.js';

/**
 * Turn a selection into a sale summary.
 *
 * Rows are re-ordered by purchase date, most recent first; lots bought on the
 * same day keep their ranking order. Totals are recomputed from the rows.
 */
export function buildSelectionReport(result: SelectionResult): SelectionReport {
  const rows: SelectionReportRow[] = result.selections
    .map((selection) => ({
      purchaseDate: selection.lot.purchaseDate,
      holdingId: selection.lot.holdingId,
      saleAmount: selection.saleAmount,
      capitalGain: selection.capitalGain,
      gainRatio: selection.gainRatio,
      sharesSold: selection.sharesSold,
      wholeShares: isWholeNumber(selection.sharesSold),
      isPartial: selection.isPartial,
    }))
    .sort((a, b) => b.purchaseDate.getTime() - a.purchaseDate.getTime());

  const totalAmount = sumDecimals(rows.map((row) => row.saleAmount));
  const totalCapitalGain = sumDecimals(rows.map((row) => row.capitalGain));

  if (result.taxRate.isZero()) {
    return { rows, target: result.target, taxRate: result.taxRate, totalAmount, totalCapitalGain };
  }

  const taxes = totalCapitalGain.times(result.taxRate);
  return {
    rows,
    target: result.target,
    taxRate: result.taxRate,
    totalAmount,
    totalCapitalGain,
    taxes,
    netAmount: totalAmount.minus(taxes),
  };
}
