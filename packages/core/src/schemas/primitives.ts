import { Decimal } from 'decimal.js';
import { z } from 'zod';

// Custom Zod type for Decimal.js instances
export const DecimalSchema = z.instanceof(Decimal, {
  message: 'Expected Decimal instance',
});

export const NonNegativeDecimalSchema = DecimalSchema.refine((val) => val.isFinite() && val.gte(0), {
  message: 'Must be a finite, non-negative decimal',
});

export const PositiveDecimalSchema = DecimalSchema.refine((val) => val.isFinite() && val.gt(0), {
  message: 'Must be a finite, positive decimal',
});
