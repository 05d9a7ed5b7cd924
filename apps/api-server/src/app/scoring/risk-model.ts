import { RatioField, RiskLevel } from '@riskline/shared-models';

/**
 * Per-ratio term of the logistic default model: the contribution is
 * `weight * (value - neutral)`, clamped to ±TERM_LIMIT. Positive weights
 * raise default probability.
 */
export interface RatioTerm {
  neutral: number;
  weight: number;
}

export const MODEL_VERSION = 'logit-2024.1';

export const INTERCEPT = -2.5;

export const TERM_LIMIT = 3;

export const RATIO_TERMS: Record<RatioField, RatioTerm> = {
  debt_to_equity_ratio: { neutral: 1.0, weight: 0.8 },
  current_ratio: { neutral: 1.5, weight: -0.6 },
  quick_ratio: { neutral: 1.0, weight: -0.4 },
  return_on_equity: { neutral: 0.12, weight: -3.0 },
  return_on_assets: { neutral: 0.06, weight: -5.0 },
  profit_margin: { neutral: 0.08, weight: -4.0 },
  interest_coverage: { neutral: 4.0, weight: -0.25 },
  fixed_asset_turnover: { neutral: 1.5, weight: -0.2 },
  total_debt_ebitda: { neutral: 2.5, weight: 0.35 },
};

/** Upper probability bound (exclusive) for each level, checked in order */
export const RISK_BANDS: { level: RiskLevel; below: number }[] = [
  { level: 'LOW', below: 0.05 },
  { level: 'MEDIUM', below: 0.15 },
  { level: 'HIGH', below: 0.35 },
  { level: 'CRITICAL', below: Number.POSITIVE_INFINITY },
];

/** Confidence with no ratios present, and the extra earned with all present */
export const BASE_CONFIDENCE = 0.5;
export const COVERAGE_CONFIDENCE = 0.45;
