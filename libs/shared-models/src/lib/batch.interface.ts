/**
 * Interfaces for bulk prediction batches: normalized records, scoring
 * results and the summary returned for a batch.
 *
 * Data Flow:
 * Spreadsheet Upload → Staging → Validation → Pipeline (resolve → score → persist) → BatchSummary
 */

// === Ratio inputs ===

/** Financial ratio columns recognised in an uploaded dataset */
export type RatioField =
  | 'debt_to_equity_ratio'
  | 'current_ratio'
  | 'quick_ratio'
  | 'return_on_equity'
  | 'return_on_assets'
  | 'profit_margin'
  | 'interest_coverage'
  | 'fixed_asset_turnover'
  | 'total_debt_ebitda';

/**
 * Ratio snapshot for one record. `null` marks a value that was missing
 * or not a number in the source file.
 */
export type FinancialRatios = Record<RatioField, number | null>;

// === Normalized record ===

/**
 * One dataset row after header normalisation and value extraction.
 */
export interface CompanyRecord {
  /** Unique entity key (stock symbol) */
  symbol: string;

  /** Display name */
  name: string;

  /** Market capitalisation, when the column is present and numeric */
  marketCap: number | null;

  /** Sector label, when present */
  sector: string | null;

  /** Ratio inputs for scoring */
  ratios: FinancialRatios;
}

// === Scoring ===

/** Risk category produced by the scoring function */
export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * Output of the scoring function, paired with the exact inputs used.
 */
export interface ScoreResult {
  riskLevel: RiskLevel;

  /** 0..1, lower when fewer ratios were available */
  confidence: number;

  /** Estimated default probability, 0..1 */
  probability: number;

  ratios: FinancialRatios;
}

// === Batch Summary ===

/**
 * Aggregate result of one pipeline run.
 * `processed` always equals `succeeded + failed`.
 */
export interface BatchSummary {
  /** Records seen */
  processed: number;

  /** Records resolved, scored and committed */
  succeeded: number;

  /** Records rolled back */
  failed: number;

  /** First failures as "Record <n>: <cause>" (5 max, in record order) */
  errors: string[];
}
