import { CurrencyAmountSchema, QuantitySchema } from '@lotwise/ingestion';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Select command input: positional arguments plus flags
 */
export const SelectCommandInputSchema = z
  .object({
    accountFile: z.string().trim().min(1, 'Account file is required'),
    priceFile: z.string().trim().min(1, 'Price file is required'),
    target: CurrencyAmountSchema.refine((val) => val.gt(0), { message: 'Sale target must be greater than 0' }),
    taxRate: QuantitySchema.refine((val) => val.gte(0) && val.lt(1), {
      message: 'Tax rate must be at least 0 and less than 1',
    }),
  })
  .extend(JsonFlagSchema.shape)
  .extend(VerboseFlagSchema.shape);

export type SelectCommandInput = z.infer<typeof SelectCommandInputSchema>;
