import type { PriceTable, SelectionReport, SelectionResult } from '@lotwise/accounting';
import { buildSelectionReport, selectLotsMinimizingGains } from '@lotwise/accounting';
import { loadPriceTable, loadTransactionHistory, type TransactionHistory } from '@lotwise/ingestion';
import { getLogger } from '@lotwise/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('SelectHandler');

export interface SelectHandlerParams {
  accountFile: string;
  priceFile: string;
  target: Decimal;
  taxRate: Decimal;
}

/**
 * Result of the select operation.
 */
export interface SelectResult {
  report: SelectionReport;
  selection: SelectionResult;
  /** Purchase lots read from the account file */
  lotCount: number;
  /** Account-file rows that did not add shares */
  skippedRows: number;
}

/**
 * Where lots and prices come from
 */
export interface SelectionSources {
  loadPriceTable(filePath: string): Promise<Result<PriceTable, Error>>;
  loadTransactionHistory(filePath: string): Promise<Result<TransactionHistory, Error>>;
}

const fileSources: SelectionSources = { loadPriceTable, loadTransactionHistory };

/**
 * Select Handler - loads the account and price files, runs lot selection and
 * builds the sale summary.
 */
export class SelectHandler {
  constructor(private readonly sources: SelectionSources = fileSources) {}

  async execute(params: SelectHandlerParams): Promise<Result<SelectResult, Error>> {
    const historyResult = await this.sources.loadTransactionHistory(params.accountFile);
    if (historyResult.isErr()) {
      return err(historyResult.error);
    }

    const pricesResult = await this.sources.loadPriceTable(params.priceFile);
    if (pricesResult.isErr()) {
      return err(pricesResult.error);
    }

    const history = historyResult.value;
    const selectionResult = selectLotsMinimizingGains(history.lots, pricesResult.value, params.target, params.taxRate);
    if (selectionResult.isErr()) {
      return err(selectionResult.error);
    }

    const selection = selectionResult.value;
    logger.info(
      {
        lots: history.lots.length,
        selected: selection.selections.length,
        target: params.target.toFixed(),
        taxRate: params.taxRate.toFixed(),
      },
      'Lot selection complete'
    );

    return ok({
      report: buildSelectionReport(selection),
      selection,
      lotCount: history.lots.length,
      skippedRows: history.skippedRows,
    });
  }
}
