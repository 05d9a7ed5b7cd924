import { CompanyRecord, FinancialRatios } from '@riskline/shared-models';
import { RATIO_FIELDS, emptyRatios } from '../common/financial-ratios';
import { ABSENT_TOKENS, DatasetColumn, DatasetRow } from '../ingestion/dataset-schema';
import { InvalidFieldError } from './pipeline.errors';

/** Decimal or exponent notation only; no hex, octal or binary literals */
const DECIMAL_NUMBER = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|Infinity)$/;

/**
 * Turn a validated dataset row into a {@link CompanyRecord}.
 *
 * Missing and not-a-number cells become `null`. Text that is neither a
 * number nor a recognised "not available" token fails the record.
 */
export function extractRecord(row: DatasetRow): CompanyRecord {
  const ratios: FinancialRatios = emptyRatios();
  for (const field of RATIO_FIELDS) {
    ratios[field] = toOptionalNumber(field, row[field]);
  }

  return {
    symbol: toRequiredText('stock_symbol', row.stock_symbol),
    name: toRequiredText('company_name', row.company_name),
    marketCap: toOptionalNumber('market_cap', row.market_cap),
    sector: toOptionalText(row.sector),
    ratios,
  };
}

/** Normalise one numeric cell; `null` marks absence */
export function toOptionalNumber(field: DatasetColumn, value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (ABSENT_TOKENS.has(text)) {
      return null;
    }
    if (!DECIMAL_NUMBER.test(text)) {
      throw new InvalidFieldError(field, `Invalid numeric value for ${field}: "${text}"`);
    }
    return Number(text);
  }

  throw new InvalidFieldError(field, `Invalid numeric value for ${field}: ${String(value)}`);
}

function toRequiredText(field: DatasetColumn, value: unknown): string {
  const text = toOptionalText(value);
  if (text === null) {
    throw new InvalidFieldError(field, `Missing value for ${field}`);
  }
  return text;
}

function toOptionalText(value: unknown): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number' && Number.isNaN(value)) {
    return null;
  }
  const text = String(value).trim();
  return ABSENT_TOKENS.has(text) ? null : text;
}
