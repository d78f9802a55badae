/**
 * @lotwise/accounting
 *
 * Tax-lot selection: which purchase lots to sell to raise a cash target while
 * realizing as little capital gain as possible.
 */

// Domain
export type { Lot, PriceTable, SaleCandidate, SaleFigures, SelectedLot, SelectionResult } from './domain/types.js';
export { createLot, createPriceTable, getHoldingIds } from './domain/lot.js';
export {
  HoldingIdSchema,
  LotSchema,
  PriceTableSchema,
  SelectionRequestSchema,
  TaxRateSchema,
  type LotInput,
  type SelectionRequest,
} from './domain/schemas.js';
export {
  InsufficientFundsError,
  InvalidSelectionRequestError,
  MissingPriceError,
  type LotSelectionError,
} from './domain/errors.js';

// Lot selection
export {
  buildSaleCandidates,
  computeSaleFigures,
  findMissingPrices,
  validatePriceCoverage,
} from './lot-selection/gain-calculator.js';
export { compareGainRatios, netOfTax, rankByGainRatio } from './lot-selection/lot-ranking-utils.js';
export { resolveCrossingLot, selectLotsMinimizingGains } from './lot-selection/lot-selector.js';

// Reports
export { buildSelectionReport } from './reports/selection-report.js';
export type { SelectionReport, SelectionReportRow } from './reports/types.js';
