import { RatioField } from '@riskline/shared-models';
import { RATIO_FIELDS } from '../common/financial-ratios';

/** Columns every dataset must contain */
export const REQUIRED_COLUMNS = ['stock_symbol', 'company_name'] as const;

/** Descriptive columns used when a company is created */
export const DESCRIPTIVE_COLUMNS = ['market_cap', 'sector'] as const;

export type DatasetColumn =
  | (typeof REQUIRED_COLUMNS)[number]
  | (typeof DESCRIPTIVE_COLUMNS)[number]
  | RatioField;

export const DATASET_COLUMNS: readonly DatasetColumn[] = [
  ...REQUIRED_COLUMNS,
  ...DESCRIPTIVE_COLUMNS,
  ...RATIO_FIELDS,
];

/**
 * One row keyed by the recognised columns. Columns missing from the file
 * are `undefined`; values are still raw spreadsheet cells.
 */
export type DatasetRow = Partial<Record<DatasetColumn, unknown>>;

/** Raw sheet contents, header names as written in the file */
export interface RawDataset {
  columns: string[];
  rows: unknown[][];
}

export interface NormalizedDataset {
  /** Recognised columns present in the file */
  columns: DatasetColumn[];

  /** Header names that matched nothing (lower-cased) */
  ignoredColumns: string[];

  rows: DatasetRow[];
}

/**
 * Cell text treated as "no value", matching common spreadsheet exports.
 * Compared after trimming.
 */
export const ABSENT_TOKENS: ReadonlySet<string> = new Set([
  '',
  'nan',
  'NaN',
  '-nan',
  '-NaN',
  'NA',
  'N/A',
  'n/a',
  '#N/A',
  '#NA',
  '<NA>',
  'null',
  'NULL',
  'None',
]);

/** Upload file types the reader understands */
export const SUPPORTED_EXTENSIONS = ['.xlsx', '.xls', '.csv'];
