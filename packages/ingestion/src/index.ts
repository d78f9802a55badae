export { CsvParser } from './csv/csv-parser.js';
export { formatCsvValidationErrors, validateCsvRows, type CsvBatchValidationResult } from './csv/row-validation.js';
export { parseCsvSource, readSourceFile } from './csv/source-file.js';
export { SourceFileNotFoundError, SourceFileValidationError, type SourceFileError } from './errors.js';
export { parseCurrencyAmount, parseQuantity, parseTransactionDate } from './parsing/parse-utils.js';
export { CurrencyAmountSchema, QuantitySchema, TransactionDateSchema } from './parsing/schemas.js';
export { PRICE_LIST_COLUMNS, PriceListRowSchema, type PriceListRow } from './price-list/schemas.js';
export { loadPriceTable, parsePriceList } from './price-list/price-list-loader.js';
export {
  TRANSACTION_HISTORY_COLUMNS,
  TransactionHistoryRowSchema,
  type TransactionHistoryRow,
} from './transaction-history/schemas.js';
export {
  loadTransactionHistory,
  parseTransactionHistory,
  type TransactionHistory,
} from './transaction-history/transaction-history-loader.js';
