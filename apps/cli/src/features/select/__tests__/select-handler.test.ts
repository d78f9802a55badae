import { InsufficientFundsError, MissingPriceError, type PriceTable } from '@lotwise/accounting';
import { assertErr, assertOk } from '@lotwise/core/test-utils';
import { SourceFileNotFoundError, type TransactionHistory } from '@lotwise/ingestion';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { SelectHandler, type SelectionSources } from '../select-handler.js';

import { prices, workedLots, workedPrices } from './select-test-utils.js';

function createSources(
  history: Result<TransactionHistory, Error>,
  priceTable: Result<PriceTable, Error>
): SelectionSources {
  return {
    loadTransactionHistory: vi.fn().mockResolvedValue(history),
    loadPriceTable: vi.fn().mockResolvedValue(priceTable),
  };
}

const params = {
  accountFile: 'account.csv',
  priceFile: 'prices.csv',
  target: new Decimal(600),
  taxRate: new Decimal(0),
};

describe('SelectHandler', () => {
  it('loads both files and returns the report', async () => {
    const sources = createSources(ok({ lots: workedLots, skippedRows: 3, totalRows: 5 }), ok(workedPrices));
    const handler = new SelectHandler(sources);

    const result = assertOk(await handler.execute(params));

    expect(sources.loadTransactionHistory).toHaveBeenCalledWith('account.csv');
    expect(sources.loadPriceTable).toHaveBeenCalledWith('prices.csv');
    expect(result.lotCount).toBe(2);
    expect(result.skippedRows).toBe(3);
    expect(result.selection.totalAmount.toFixed()).toBe('700');
    expect(result.report.rows.map((row) => row.holdingId)).toEqual(['F', 'F']);
  });

  it('stops at a missing account file', async () => {
    const sources = createSources(err(new SourceFileNotFoundError('account.csv')), ok(workedPrices));
    const handler = new SelectHandler(sources);

    const error = assertErr(await handler.execute(params));

    expect(error).toBeInstanceOf(SourceFileNotFoundError);
    expect(sources.loadPriceTable).not.toHaveBeenCalled();
  });

  it('reports holdings without a price', async () => {
    const sources = createSources(ok({ lots: workedLots, skippedRows: 0, totalRows: 2 }), ok(prices({ G: '1' })));
    const handler = new SelectHandler(sources);

    const error = assertErr(await handler.execute(params));

    expect(error).toBeInstanceOf(MissingPriceError);
    expect(error.message).toBe('Missing price for holding: F');
  });

  it('fails when every lot together falls short', async () => {
    const sources = createSources(ok({ lots: workedLots, skippedRows: 0, totalRows: 2 }), ok(workedPrices));
    const handler = new SelectHandler(sources);

    const error = assertErr(await handler.execute({ ...params, target: new Decimal(2000) }));

    expect(error).toBeInstanceOf(InsufficientFundsError);
  });
});
