import { formatZodIssues, sumDecimals } from '@lotwise/core';
import { getLogger } from '@lotwise/logger';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { InsufficientFundsError, InvalidSelectionRequestError, type LotSelectionError } from '../domain/errors.js';
import { SelectionRequestSchema } from '../domain/schemas.js';
import type { Lot, PriceTable, SaleCandidate, SelectedLot, SelectionResult } from '../domain/types.js';

import { buildSaleCandidates } from './gain-calculator.js';
import { netOfTax, rankByGainRatio } from './lot-ranking-utils.js';

const logger = getLogger('LotSelector');

/**
 * Choose lots to sell so that `target` is raised after tax while realizing as
 * little capital gain as possible.
 *
 * Lots are taken whole in ascending gain-ratio order until the running
 * proceeds, net of `taxRate` × running gain, pass the target. The lot that
 * crosses the target is cut down to the fewest whole shares that still reach
 * it. Greedy: the prefix is never re-optimized once tax is involved.
 *
 * Losses rank first (negative ratio) and are summed like gains; no loss
 * harvesting happens here.
 *
 * @returns the selection in ranking order, or the first failure; never a partial result
 */
export function selectLotsMinimizingGains(
  lots: readonly Lot[],
  prices: PriceTable,
  target: Decimal,
  taxRate: Decimal = new Decimal(0)
): Result<SelectionResult, LotSelectionError> {
  const request = SelectionRequestSchema.safeParse({ target, taxRate });
  if (!request.success) {
    return err(new InvalidSelectionRequestError(formatZodIssues(request.error)));
  }

  const candidatesResult = buildSaleCandidates(lots, prices);
  if (candidatesResult.isErr()) {
    logger.warn({ holdingIds: candidatesResult.error.holdingIds }, 'Selection aborted: missing prices');
    return err(candidatesResult.error);
  }

  const ranked = rankByGainRatio(candidatesResult.value);
  const unranked = ranked.filter((candidate) => !candidate.figures.gainRatio.isFinite());
  if (unranked.length > 0) {
    logger.warn(
      { lotIndexes: unranked.map((candidate) => candidate.lotIndex) },
      'Lots with a zero sale amount ranked last'
    );
  }

  let amount = new Decimal(0);
  let capitalGain = new Decimal(0);
  const selections: SelectedLot[] = [];

  for (const candidate of ranked) {
    // Nothing to sell; skipping leaves both running totals unchanged
    if (candidate.lot.shares.lte(0)) {
      continue;
    }

    const amountBefore = amount;
    const capitalGainBefore = capitalGain;

    amount = amount.plus(candidate.figures.saleAmount);
    capitalGain = capitalGain.plus(candidate.figures.capitalGain);

    if (netOfTax(amount, capitalGain, taxRate).gt(target)) {
      selections.push(
        resolveCrossingLot(candidate, netOfTax(amountBefore, capitalGainBefore, taxRate), target, taxRate)
      );
      return ok(summarize(selections, target, taxRate, lots.length));
    }

    selections.push(toSelectedLot(candidate));
  }

  const availableNetAmount = netOfTax(amount, capitalGain, taxRate);
  if (availableNetAmount.gte(target)) {
    return ok(summarize(selections, target, taxRate, lots.length));
  }

  logger.debug(
    { target: target.toFixed(), availableNetAmount: availableNetAmount.toFixed(), lots: lots.length },
    'Selection failed: insufficient funds'
  );
  return err(new InsufficientFundsError(target, availableNetAmount));
}

/**
 * Sell only as many whole shares of the crossing lot as the target needs.
 *
 * With `x` the lot's net proceeds per share, `n = floor((target − netBefore) / x) + 1`
 * is the smallest whole-share count that reaches the target. The lot stays
 * whole unless `n` is below its whole-share count.
 */
export function resolveCrossingLot(
  candidate: SaleCandidate,
  netBefore: Decimal,
  target: Decimal,
  taxRate: Decimal
): SelectedLot {
  const { lot, figures, pricePerShare } = candidate;
  const netPerShare = netOfTax(figures.saleAmount, figures.capitalGain, taxRate).div(lot.shares);

  if (!netPerShare.isFinite() || netPerShare.lte(0)) {
    return toSelectedLot(candidate);
  }

  const sharesNeeded = target.minus(netBefore).div(netPerShare).floor().plus(1);
  if (sharesNeeded.gte(lot.shares.trunc())) {
    return toSelectedLot(candidate);
  }

  return {
    lot,
    lotIndex: candidate.lotIndex,
    sharesSold: sharesNeeded,
    pricePerShare,
    saleAmount: pricePerShare.times(sharesNeeded),
    capitalGain: pricePerShare.minus(lot.costBasisPerShare).times(sharesNeeded),
    gainRatio: figures.gainRatio,
    isPartial: true,
  };
}

function toSelectedLot(candidate: SaleCandidate): SelectedLot {
  return {
    lot: candidate.lot,
    lotIndex: candidate.lotIndex,
    sharesSold: candidate.lot.shares,
    pricePerShare: candidate.pricePerShare,
    saleAmount: candidate.figures.saleAmount,
    capitalGain: candidate.figures.capitalGain,
    gainRatio: candidate.figures.gainRatio,
    isPartial: false,
  };
}

function summarize(selections: SelectedLot[], target: Decimal, taxRate: Decimal, lotCount: number): SelectionResult {
  const totalAmount = sumDecimals(selections.map((selection) => selection.saleAmount));
  const totalCapitalGain = sumDecimals(selections.map((selection) => selection.capitalGain));
  const totalTax = totalCapitalGain.times(taxRate);

  logger.debug(
    {
      lots: lotCount,
      selected: selections.length,
      partial: selections.some((selection) => selection.isPartial),
      totalAmount: totalAmount.toFixed(),
      totalCapitalGain: totalCapitalGain.toFixed(),
    },
    'Selection complete'
  );

  return {
    selections,
    target,
    taxRate,
    totalAmount,
    totalCapitalGain,
    totalTax,
    netAmount: totalAmount.minus(totalTax),
  };
}
