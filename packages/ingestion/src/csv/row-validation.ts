/**
 * Batch validation of CSV rows against a zod row schema
 *
 * Row errors are collected rather than thrown so a load can report every bad
 * row at once.
 */
import type { z } from 'zod';

/**
 * Batch validation result for multiple rows
 */
export interface CsvBatchValidationResult<T> {
  invalid: { data: unknown; errors: z.ZodError; rowIndex: number }[];
  totalRows: number;
  valid: { data: T; rowIndex: number }[];
}

/**
 * Validate multiple CSV rows in batch
 */
export function validateCsvRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: readonly unknown[]
): CsvBatchValidationResult<T> {
  const valid: { data: T; rowIndex: number }[] = [];
  const invalid: { data: unknown; errors: z.ZodError; rowIndex: number }[] = [];

  data.forEach((item, index) => {
    const result = schema.safeParse(item);
    if (result.success) {
      valid.push({ data: result.data, rowIndex: index });
    } else {
      invalid.push({ data: item, errors: result.error, rowIndex: index });
    }
  });

  return {
    invalid,
    totalRows: data.length,
    valid,
  };
}

/**
 * Helper to format validation errors for logging and error messages
 */
export function formatCsvValidationErrors<T>(result: CsvBatchValidationResult<T>, label: string): string {
  if (result.invalid.length === 0) {
    return `All ${result.totalRows} ${label} rows validated successfully`;
  }

  const errorSummary = result.invalid
    .slice(0, 3) // Show first 3 errors
    .map(({ errors, rowIndex }) => {
      const fieldErrors = errors.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return `Row ${rowIndex + 1}: ${fieldErrors}`;
    })
    .join(' | ');

  const additionalErrors = result.invalid.length > 3 ? ` and ${result.invalid.length - 3} more` : '';

  return `${result.invalid.length} invalid ${label} rows out of ${result.totalRows}. Valid: ${result.valid.length}. Errors: ${errorSummary}${additionalErrors}`;
}
