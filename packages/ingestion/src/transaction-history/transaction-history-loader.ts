import { createLot, type Lot } from '@lotwise/accounting';
import { getLogger } from '@lotwise/logger';
import { err, ok, type Result } from 'neverthrow';

import { formatCsvValidationErrors, validateCsvRows } from '../csv/row-validation.js';
import { parseCsvSource, readSourceFile } from '../csv/source-file.js';
import { SourceFileValidationError } from '../errors.js';

import { TRANSACTION_HISTORY_COLUMNS, TransactionHistoryRowSchema } from './schemas.js';

const logger = getLogger('TransactionHistoryLoader');

export interface TransactionHistory {
  lots: Lot[];
  /** Rows with zero or negative shares (sales, dividends paid out, transfers) */
  skippedRows: number;
  totalRows: number;
}

/**
 * Turn transaction-history CSV text into purchase lots.
 *
 * Every row with positive `Shares transacted` is a lot whose cost basis is its
 * `Share price`. Any invalid row fails the whole load.
 */
export function parseTransactionHistory(
  content: string,
  source = 'transaction history'
): Result<TransactionHistory, SourceFileValidationError> {
  const rowsResult = parseCsvSource(content, source, TRANSACTION_HISTORY_COLUMNS);
  if (rowsResult.isErr()) {
    return err(rowsResult.error);
  }

  const validation = validateCsvRows(TransactionHistoryRowSchema, rowsResult.value);
  if (validation.invalid.length > 0) {
    return err(new SourceFileValidationError(source, [formatCsvValidationErrors(validation, 'transaction history')]));
  }

  const lots: Lot[] = [];
  const issues: string[] = [];
  let skippedRows = 0;

  for (const { data: row, rowIndex } of validation.valid) {
    const shares = row['Shares transacted'];
    if (shares.lte(0)) {
      skippedRows++;
      logger.debug(
        { fund: row.Fund, row: rowIndex + 1, shares: shares.toString(), transactionType: row['Transaction type'] },
        'Row does not add shares'
      );
      continue;
    }

    const lotResult = createLot({
      costBasisPerShare: row['Share price'],
      holdingId: row.Fund,
      purchaseDate: row.Date,
      shares,
    });
    if (lotResult.isErr()) {
      issues.push(`Row ${rowIndex + 1}: ${lotResult.error.message}`);
      continue;
    }
    lots.push(lotResult.value);
  }

  if (issues.length > 0) {
    return err(new SourceFileValidationError(source, issues));
  }

  if (skippedRows > 0) {
    logger.warn({ skippedRows, source }, `Skipped ${skippedRows} row(s) with zero or negative shares`);
  }
  logger.info({ lots: lots.length, source, totalRows: validation.totalRows }, 'Loaded transaction history');

  return ok({ lots, skippedRows, totalRows: validation.totalRows });
}

/**
 * Read and parse a transaction-history CSV file
 */
export async function loadTransactionHistory(filePath: string): Promise<Result<TransactionHistory, Error>> {
  const contentResult = await readSourceFile(filePath);
  if (contentResult.isErr()) {
    return err(contentResult.error);
  }
  return parseTransactionHistory(contentResult.value, filePath);
}
