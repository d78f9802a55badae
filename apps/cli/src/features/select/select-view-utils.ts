/**
 * Select view pure utility functions.
 */

import type { SelectionReport, SelectionReportRow } from '@lotwise/accounting';
import { formatFixed } from '@lotwise/core';
import type { Decimal } from 'decimal.js';

const COLUMN_WIDTH = 10;
const FUND_WIDTH = 25;

/**
 * Sale summary in JSON output; decimals are strings.
 */
export interface SelectionReportJson {
  lots: {
    capitalGain: string;
    gainRatio: string;
    holdingId: string;
    isPartial: boolean;
    purchaseDate: string;
    saleAmount: string;
    sharesSold: string;
    wholeShares: boolean;
  }[];
  target: string;
  taxRate: string;
  totals: {
    amount: string;
    capitalGain: string;
    netAmount?: string | undefined;
    taxes?: string | undefined;
  };
}

/** Run context alongside the report in the JSON envelope */
export interface SelectRunMetadata {
  accountFile: string;
  lotCount: number;
  priceFile: string;
  skippedRows: number;
}

export function formatPurchaseDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * `0.2` → `20%`
 */
export function formatTaxRatePercent(taxRate: Decimal): string {
  return `${taxRate.times(100).toString()}%`;
}

/**
 * Whole share counts are printed as-is and flagged, since reinvested lots
 * rarely hold a whole number of shares.
 */
export function formatShares(shares: Decimal, wholeShares: boolean): string {
  if (wholeShares) {
    return `${shares.toString().padStart(COLUMN_WIDTH)} [whole]`;
  }
  return formatFixed(shares, 3, COLUMN_WIDTH);
}

export function formatReportHeader(): string {
  const columns = [
    'date'.padStart(COLUMN_WIDTH),
    'fund'.padStart(FUND_WIDTH),
    'amount'.padStart(COLUMN_WIDTH),
    'cap gains'.padStart(COLUMN_WIDTH),
    'cg ratio'.padStart(COLUMN_WIDTH),
    'shares'.padStart(COLUMN_WIDTH),
  ];
  return `  ${columns.join(', ')}`;
}

export function formatReportRow(row: SelectionReportRow): string {
  const columns = [
    formatPurchaseDate(row.purchaseDate),
    row.holdingId.padStart(FUND_WIDTH),
    formatFixed(row.saleAmount, 3, COLUMN_WIDTH),
    formatFixed(row.capitalGain, 3, COLUMN_WIDTH),
    formatFixed(row.gainRatio, 3, COLUMN_WIDTH),
    formatShares(row.sharesSold, row.wholeShares),
  ];
  return `  ${columns.join(', ')}`;
}

export function formatTotals(report: SelectionReport): string[] {
  const lines = [
    `amount:     ${formatFixed(report.totalAmount, 3, COLUMN_WIDTH)}`,
    `cap gains:  ${formatFixed(report.totalCapitalGain, 3, COLUMN_WIDTH)}`,
  ];
  if (report.taxes !== undefined && report.netAmount !== undefined) {
    lines.push(`taxes:      ${formatFixed(report.taxes, 3, COLUMN_WIDTH)}`);
    lines.push(`net amount: ${formatFixed(report.netAmount, 3, COLUMN_WIDTH)}`);
  }
  return lines;
}

/**
 * Full text rendering of the sale summary
 */
export function formatSelectionReport(report: SelectionReport): string[] {
  return [
    'Selling the following lots:',
    formatReportHeader(),
    ...report.rows.map((row) => formatReportRow(row)),
    'will result in',
    ...formatTotals(report),
  ];
}

export function toSelectionReportJson(report: SelectionReport): SelectionReportJson {
  return {
    target: report.target.toFixed(),
    taxRate: report.taxRate.toFixed(),
    lots: report.rows.map((row) => ({
      purchaseDate: formatPurchaseDate(row.purchaseDate),
      holdingId: row.holdingId,
      sharesSold: row.sharesSold.toFixed(),
      saleAmount: row.saleAmount.toFixed(),
      capitalGain: row.capitalGain.toFixed(),
      gainRatio: row.gainRatio.toFixed(),
      wholeShares: row.wholeShares,
      isPartial: row.isPartial,
    })),
    totals: {
      amount: report.totalAmount.toFixed(),
      capitalGain: report.totalCapitalGain.toFixed(),
      taxes: report.taxes?.toFixed(),
      netAmount: report.netAmount?.toFixed(),
    },
  };
}
