import { RATIO_FIELDS } from '../common/financial-ratios';

const ratioColumns = RATIO_FIELDS.map((field) => `      ${field} REAL`).join(',\n');

/**
 * Tables are created on boot if absent. Ratio snapshots and predictions are
 * append-only; companies are unique per symbol.
 */
export const SCHEMA_SQL = `
    CREATE TABLE IF NOT EXISTS companies (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      symbol TEXT NOT NULL UNIQUE,
      name TEXT NOT NULL,
      market_cap REAL,
      sector TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS financial_ratios (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
${ratioColumns},
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS default_rate_predictions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
      risk_level TEXT NOT NULL,
      confidence REAL NOT NULL,
      probability REAL NOT NULL,
${ratioColumns},
      predicted_at TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_financial_ratios_company ON financial_ratios(company_id);
    CREATE INDEX IF NOT EXISTS idx_predictions_company ON default_rate_predictions(company_id);
`;
