import { createPriceTable, type PriceTable } from '@lotwise/accounting';
import { getLogger } from '@lotwise/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { formatCsvValidationErrors, validateCsvRows } from '../csv/row-validation.js';
import { parseCsvSource, readSourceFile } from '../csv/source-file.js';
import { SourceFileValidationError } from '../errors.js';

import { PRICE_LIST_COLUMNS, PriceListRowSchema } from './schemas.js';

const logger = getLogger('PriceListLoader');

/**
 * Turn price-list CSV text into a price table. A fund listed twice takes its
 * last price.
 */
export function parsePriceList(content: string, source = 'price list'): Result<PriceTable, SourceFileValidationError> {
  const rowsResult = parseCsvSource(content, source, PRICE_LIST_COLUMNS);
  if (rowsResult.isErr()) {
    return err(rowsResult.error);
  }

  const validation = validateCsvRows(PriceListRowSchema, rowsResult.value);
  if (validation.invalid.length > 0) {
    return err(new SourceFileValidationError(source, [formatCsvValidationErrors(validation, 'price list')]));
  }

  const seen = new Map<string, Decimal>();
  for (const { data: row, rowIndex } of validation.valid) {
    const previous = seen.get(row.Fund);
    if (previous !== undefined) {
      logger.warn(
        { fund: row.Fund, previousPrice: previous.toString(), price: row['Share price'].toString(), row: rowIndex + 1 },
        'Duplicate price, keeping the later one'
      );
    }
    seen.set(row.Fund, row['Share price']);
  }

  const tableResult = createPriceTable(seen);
  if (tableResult.isErr()) {
    return err(new SourceFileValidationError(source, [tableResult.error.message]));
  }

  logger.info({ holdings: tableResult.value.size, source }, 'Loaded price list');
  return ok(tableResult.value);
}

/**
 * Read and parse a price-list CSV file
 */
export async function loadPriceTable(filePath: string): Promise<Result<PriceTable, Error>> {
  const contentResult = await readSourceFile(filePath);
  if (contentResult.isErr()) {
    return err(contentResult.error);
  }
  return parsePriceList(contentResult.value, filePath);
}
