import { DecimalSchema, NonNegativeDecimalSchema, PositiveDecimalSchema } from '@lotwise/core';
import { z } from 'zod';

/**
 * Zod schemas for validation and parsing
 */

export const HoldingIdSchema = z.string().trim().min(1, 'Holding id must not be empty');

export const LotSchema = z.object({
  purchaseDate: z.date(),
  holdingId: HoldingIdSchema,
  shares: PositiveDecimalSchema,
  costBasisPerShare: NonNegativeDecimalSchema,
});

export const PriceTableSchema = z.map(HoldingIdSchema, NonNegativeDecimalSchema);

export const TaxRateSchema = DecimalSchema.refine((val) => val.isFinite() && val.gte(0) && val.lt(1), {
  message: 'Tax rate must be at least 0 and less than 1',
});

export const SelectionRequestSchema = z.object({
  target: DecimalSchema.refine((val) => val.isFinite() && val.gt(0), {
    message: 'Sale target must be greater than 0',
  }),
  taxRate: TaxRateSchema,
});

export type LotInput = z.infer<typeof LotSchema>;
export type SelectionRequest = z.infer<typeof SelectionRequestSchema>;
