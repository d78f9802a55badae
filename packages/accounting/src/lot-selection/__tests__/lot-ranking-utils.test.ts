import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { createTestLot } from '../../__tests__/test-utils.js';
import type { SaleCandidate } from '../../domain/types.js';
import { computeSaleFigures } from '../gain-calculator.js';
import { compareGainRatios, netOfTax, rankByGainRatio } from '../lot-ranking-utils.js';

function createCandidate(lotIndex: number, shares: string, costBasis: string, price = '100'): SaleCandidate {
  const lot = createTestLot('FUND', shares, costBasis);
  const pricePerShare = new Decimal(price);
  return { lot, lotIndex, pricePerShare, figures: computeSaleFigures(lot, pricePerShare) };
}

describe('lot-ranking-utils', () => {
  describe('compareGainRatios', () => {
    it('should order finite ratios ascending', () => {
      expect(compareGainRatios(new Decimal('-0.2'), new Decimal('0.5'))).toBe(-1);
      expect(compareGainRatios(new Decimal('0.5'), new Decimal('0.2'))).toBe(1);
      expect(compareGainRatios(new Decimal('0.3'), new Decimal('0.3'))).toBe(0);
    });

    it('should place non-finite ratios after finite ones', () => {
      const nan = new Decimal(NaN);
      const negativeInfinity = new Decimal(-1).div(0);

      expect(compareGainRatios(new Decimal('0.9'), nan)).toBe(-1);
      expect(compareGainRatios(nan, new Decimal('-5'))).toBe(1);
      expect(compareGainRatios(negativeInfinity, new Decimal('0'))).toBe(1);
      expect(compareGainRatios(nan, negativeInfinity)).toBe(0);
    });
  });

  describe('rankByGainRatio', () => {
    it('should rank losses first and the largest gain ratio last', () => {
      const ranked = rankByGainRatio([
        createCandidate(0, '10', '50'), // 0.5
        createCandidate(1, '5', '80'), // 0.2
        createCandidate(2, '4', '120'), // -0.2
      ]);

      expect(ranked.map((candidate) => candidate.lotIndex)).toEqual([2, 1, 0]);
    });

    it('should keep input order for equal ratios', () => {
      const ranked = rankByGainRatio([
        createCandidate(0, '10', '50'),
        createCandidate(1, '3', '80'),
        createCandidate(2, '2', '50'),
        createCandidate(3, '7', '80'),
      ]);

      expect(ranked.map((candidate) => candidate.lotIndex)).toEqual([1, 3, 0, 2]);
    });

    it('should move zero-sale-amount lots to the end in input order', () => {
      const ranked = rankByGainRatio([
        createCandidate(0, '0', '50'), // NaN
        createCandidate(1, '10', '50'), // 0.5
        createCandidate(2, '2', '50', '0'), // -Infinity
        createCandidate(3, '5', '80'), // 0.2
      ]);

      expect(ranked.map((candidate) => candidate.lotIndex)).toEqual([3, 1, 0, 2]);
    });

    it('should not reorder its input', () => {
      const candidates = [createCandidate(0, '10', '50'), createCandidate(1, '5', '80')];

      rankByGainRatio(candidates);

      expect(candidates.map((candidate) => candidate.lotIndex)).toEqual([0, 1]);
    });
  });

  describe('netOfTax', () => {
    it('should withhold the tax rate from the gain', () => {
      expect(netOfTax(new Decimal('1500'), new Decimal('600'), new Decimal('0.2')).toString()).toBe('1380');
    });

    it('should add back tax on a loss', () => {
      expect(netOfTax(new Decimal('400'), new Decimal('-80'), new Decimal('0.25')).toString()).toBe('420');
    });
  });
});
