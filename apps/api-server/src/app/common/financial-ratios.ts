import { FinancialRatios, RatioField } from '@riskline/shared-models';

/** Ratio columns in storage and scoring order */
export const RATIO_FIELDS: readonly RatioField[] = [
  'debt_to_equity_ratio',
  'current_ratio',
  'quick_ratio',
  'return_on_equity',
  'return_on_assets',
  'profit_margin',
  'interest_coverage',
  'fixed_asset_turnover',
  'total_debt_ebitda',
];

/** A snapshot with every ratio absent */
export function emptyRatios(): FinancialRatios {
  return {
    debt_to_equity_ratio: null,
    current_ratio: null,
    quick_ratio: null,
    return_on_equity: null,
    return_on_assets: null,
    profit_margin: null,
    interest_coverage: null,
    fixed_asset_turnover: null,
    total_debt_ebitda: null,
  };
}
