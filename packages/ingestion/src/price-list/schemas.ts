import { z } from 'zod';

import { CurrencyAmountSchema } from '../parsing/schemas.js';

export const PRICE_LIST_COLUMNS = ['Fund', 'Share price'] as const;

export const PriceListRowSchema = z.object({
  Fund: z.string().trim().min(1, 'Fund must not be empty'),
  'Share price': CurrencyAmountSchema,
});

export type PriceListRow = z.infer<typeof PriceListRowSchema>;
