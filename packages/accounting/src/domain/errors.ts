import type { Decimal } from 'decimal.js';

/**
 * One or more holdings referenced by the lots have no current price.
 */
export class MissingPriceError extends Error {
  readonly kind = 'missing_price' as const;

  constructor(public readonly holdingIds: readonly string[]) {
    super(`Missing price for ${holdingIds.length === 1 ? 'holding' : 'holdings'}: ${holdingIds.join(', ')}`);
    this.name = 'MissingPriceError';
  }
}

/**
 * Selling every lot still does not raise the target once tax is withheld.
 */
export class InsufficientFundsError extends Error {
  readonly kind = 'insufficient_funds' as const;

  constructor(
    public readonly target: Decimal,
    public readonly availableNetAmount: Decimal
  ) {
    super(
      `Insufficient funds: selling every lot raises ${availableNetAmount.toFixed(2)} after tax, ` +
        `short of the ${target.toFixed(2)} target`
    );
    this.name = 'InsufficientFundsError';
  }
}

/**
 * Target or tax rate outside the accepted range.
 */
export class InvalidSelectionRequestError extends Error {
  readonly kind = 'invalid_request' as const;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid selection request: ${issues.join('; ')}`);
    this.name = 'InvalidSelectionRequestError';
  }
}

export type LotSelectionError = MissingPriceError | InsufficientFundsError | InvalidSelectionRequestError;
