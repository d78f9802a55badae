import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { z } from 'zod';

import { parseCurrencyAmount, parseQuantity, parseTransactionDate } from './parse-utils.js';

/**
 * Lift a Result-returning parser into a zod string transform
 */
function resultTransform<T>(parser: (value: string) => Result<T, Error>) {
  return (value: string, ctx: z.RefinementCtx): T => {
    const parsed = parser(value);
    if (parsed.isErr()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, fatal: true, message: parsed.error.message });
      return z.NEVER;
    }
    return parsed.value;
  };
}

/** `$1,234.56` → Decimal */
export const CurrencyAmountSchema: z.ZodType<Decimal, z.ZodTypeDef, string> = z
  .string()
  .transform(resultTransform(parseCurrencyAmount));

/** `1,234.567` → Decimal */
export const QuantitySchema: z.ZodType<Decimal, z.ZodTypeDef, string> = z
  .string()
  .transform(resultTransform(parseQuantity));

/** `MM/DD/YYYY` → Date at midnight UTC */
export const TransactionDateSchema: z.ZodType<Date, z.ZodTypeDef, string> = z
  .string()
  .transform(resultTransform(parseTransactionDate));
