import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

const NUMBER_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;
const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Parse a brokerage currency string such as `$1,234.56`, `-$12.00` or `1234.5`.
 *
 * Dollar signs at either end and thousands separators are dropped.
 */
export function parseCurrencyAmount(value: string): Result<Decimal, Error> {
  const trimmed = value.trim();
  const negative = trimmed.startsWith('-');
  const unsigned = (negative ? trimmed.slice(1) : trimmed).replace(/^\$+|\$+$/g, '').replaceAll(',', '');
  const cleaned = negative ? `-${unsigned}` : unsigned;

  if (!NUMBER_PATTERN.test(cleaned)) {
    return err(new Error(`Invalid currency amount: "${value}"`));
  }
  return ok(new Decimal(cleaned));
}

/**
 * Parse a plain decimal such as a share count, allowing thousands separators
 */
export function parseQuantity(value: string): Result<Decimal, Error> {
  const cleaned = value.trim().replaceAll(',', '');

  if (!NUMBER_PATTERN.test(cleaned)) {
    return err(new Error(`Invalid number: "${value}"`));
  }
  return ok(new Decimal(cleaned));
}

/**
 * Parse a `MM/DD/YYYY` date to midnight UTC, rejecting impossible dates (02/30/2021)
 */
export function parseTransactionDate(value: string): Result<Date, Error> {
  const match = US_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return err(new Error(`Invalid date "${value}", expected MM/DD/YYYY`));
  }

  const month = Number(match[1]);
  const day = Number(match[2]);
  const year = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return err(new Error(`Invalid calendar date "${value}"`));
  }
  return ok(date);
}
