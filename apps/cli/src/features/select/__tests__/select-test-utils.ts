import { createLot, createPriceTable, type Lot, type PriceTable } from '@lotwise/accounting';
import { assertOk } from '@lotwise/core/test-utils';
import { Decimal } from 'decimal.js';

export function lot(holdingId: string, shares: string, costBasisPerShare: string, purchaseDate: string): Lot {
  return assertOk(
    createLot({
      costBasisPerShare: new Decimal(costBasisPerShare),
      holdingId,
      purchaseDate: new Date(`${purchaseDate}T00:00:00.000Z`),
      shares: new Decimal(shares),
    })
  );
}

export function prices(record: Record<string, string>): PriceTable {
  return assertOk(createPriceTable(Object.entries(record).map(([fund, price]) => [fund, new Decimal(price)] as const)));
}

/** Fund F at 100: lot A 10 shares bought at 50, lot B 5 shares bought at 80 */
export const workedLots: Lot[] = [lot('F', '10', '50', '2020-01-15'), lot('F', '5', '80', '2021-06-01')];
export const workedPrices: PriceTable = prices({ F: '100' });
