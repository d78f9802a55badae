import { z } from 'zod';

import { CurrencyAmountSchema, QuantitySchema, TransactionDateSchema } from '../parsing/schemas.js';

export const TRANSACTION_HISTORY_COLUMNS = [
  'Date',
  'Fund',
  'Transaction type',
  'Shares transacted',
  'Share price',
  'Amount',
] as const;

/**
 * One row of a brokerage transaction-history export.
 * Columns beyond the ones named here are ignored.
 */
export const TransactionHistoryRowSchema = z.object({
  Date: TransactionDateSchema,
  Fund: z.string().trim().min(1, 'Fund must not be empty'),
  'Transaction type': z.string(),
  'Shares transacted': QuantitySchema,
  'Share price': CurrencyAmountSchema,
  Amount: CurrencyAmountSchema,
});

export type TransactionHistoryRow = z.infer<typeof TransactionHistoryRowSchema>;
