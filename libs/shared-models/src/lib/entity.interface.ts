import { FinancialRatios, RiskLevel } from './batch.interface';

/**
 * A tracked company, keyed by its unique stock symbol.
 */
export interface Company {
  id: number;
  symbol: string;
  name: string;
  marketCap: number | null;
  sector: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Fields used to create a company on first sight */
export interface CompanyFields {
  symbol: string;
  name: string;
  marketCap: number | null;
  sector: string | null;
}

/**
 * Point-in-time ratio snapshot stored for a company.
 */
export interface RatioSnapshot {
  id: number;
  companyId: number;
  ratios: FinancialRatios;
  createdAt: string;
}

/**
 * Stored prediction, with the ratio inputs that produced it.
 */
export interface PredictionRecord {
  id: number;
  companyId: number;
  riskLevel: RiskLevel;
  confidence: number;
  probability: number;
  ratios: FinancialRatios;
  predictedAt: string;
}

/**
 * A company with its append-only history, newest first.
 */
export interface CompanyHistory {
  company: Company;
  predictions: PredictionRecord[];
  ratios: RatioSnapshot[];
}
