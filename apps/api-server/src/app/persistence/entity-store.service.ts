import { Inject, Injectable, Logger } from '@nestjs/common';
import Database from 'better-sqlite3';
import {
  Company,
  CompanyFields,
  CompanyHistory,
  FinancialRatios,
  PredictionRecord,
  RatioSnapshot,
  RiskLevel,
  ScoreResult,
} from '@riskline/shared-models';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { RATIO_FIELDS, emptyRatios } from '../common/financial-ratios';
import { DatabaseService } from './database.service';
import { PersistenceSession } from './persistence-session';
import { EntityConflictError } from './persistence.errors';

interface CompanyRow {
  id: number;
  symbol: string;
  name: string;
  market_cap: number | null;
  sector: string | null;
  created_at: string;
  updated_at: string;
}

type RatioRow = FinancialRatios & {
  id: number;
  company_id: number;
  created_at: string;
};

type PredictionRow = FinancialRatios & {
  id: number;
  company_id: number;
  risk_level: RiskLevel;
  confidence: number;
  probability: number;
  predicted_at: string;
};

const RATIO_COLUMN_LIST = RATIO_FIELDS.join(', ');
const RATIO_PARAM_LIST = RATIO_FIELDS.map((f) => `@${f}`).join(', ');

/**
 * Company lookup-or-create and the append-only ratio/prediction history.
 *
 * Writes go through the caller's {@link PersistenceSession} so they share the
 * caller's transaction. Reads outside a batch use the shared connection.
 */
@Injectable()
export class EntityStoreService {
  private readonly logger = new Logger(EntityStoreService.name);

  constructor(
    private readonly database: DatabaseService,
    @Inject(APP_CONFIG) private readonly config: AppConfig
  ) {}

  findBySymbol(session: PersistenceSession, symbol: string): Company | undefined {
    return this.selectCompany(session.connection, symbol);
  }

  create(session: PersistenceSession, fields: CompanyFields): Company {
    const now = new Date().toISOString();
    const result = session.connection
      .prepare<[string, string, number | null, string | null, string, string]>(
        `INSERT INTO companies (symbol, name, market_cap, sector, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(fields.symbol, fields.name, fields.marketCap, fields.sector, now, now);

    this.logger.debug(`Company created: ${fields.symbol} (id: ${result.lastInsertRowid})`);

    return {
      id: Number(result.lastInsertRowid),
      symbol: fields.symbol,
      name: fields.name,
      marketCap: fields.marketCap,
      sector: fields.sector,
      createdAt: now,
      updatedAt: now,
    };
  }

  /**
   * Return the company for `fields.symbol`, creating it on first sight.
   *
   * Another session may insert the same symbol between our lookup and our
   * insert; the unique constraint rejects the loser, which then retries the
   * lookup. Gives up after `ENTITY_CONFLICT_RETRIES` extra attempts.
   */
  resolve(session: PersistenceSession, fields: CompanyFields): Company {
    const maxAttempts = this.config.entityConflictRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const existing = this.findBySymbol(session, fields.symbol);
      if (existing) {
        return existing;
      }

      try {
        return this.create(session, fields);
      } catch (err) {
        if (!isUniqueViolation(err)) {
          throw err;
        }
        this.logger.debug(
          `Symbol ${fields.symbol} was created concurrently (attempt ${attempt}/${maxAttempts}), retrying lookup`
        );
      }
    }

    throw new EntityConflictError(fields.symbol, maxAttempts);
  }

  savePrediction(
    session: PersistenceSession,
    companyId: number,
    score: ScoreResult
  ): number {
    const now = new Date().toISOString();
    const result = session.connection
      .prepare<Record<string, number | string | null>>(
        `INSERT INTO default_rate_predictions
           (company_id, risk_level, confidence, probability, ${RATIO_COLUMN_LIST}, predicted_at, created_at)
         VALUES (@company_id, @risk_level, @confidence, @probability, ${RATIO_PARAM_LIST}, @predicted_at, @created_at)`
      )
      .run({
        ...score.ratios,
        company_id: companyId,
        risk_level: score.riskLevel,
        confidence: score.confidence,
        probability: score.probability,
        predicted_at: now,
        created_at: now,
      });
    return Number(result.lastInsertRowid);
  }

  saveRatios(
    session: PersistenceSession,
    companyId: number,
    ratios: FinancialRatios
  ): number {
    const result = session.connection
      .prepare<Record<string, number | string | null>>(
        `INSERT INTO financial_ratios (company_id, ${RATIO_COLUMN_LIST}, created_at)
         VALUES (@company_id, ${RATIO_PARAM_LIST}, @created_at)`
      )
      .run({
        ...ratios,
        company_id: companyId,
        created_at: new Date().toISOString(),
      });
    return Number(result.lastInsertRowid);
  }

  // --- Reads outside a batch ---

  countEntities(): number {
    const row = this.database
      .reader()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM companies')
      .get();
    return row?.count ?? 0;
  }

  /**
   * A company with its predictions and ratio snapshots, newest first.
   */
  getHistory(symbol: string): CompanyHistory | undefined {
    const db = this.database.reader();
    const company = this.selectCompany(db, symbol);
    if (!company) return undefined;

    const predictions = db
      .prepare<[number], PredictionRow>(
        'SELECT * FROM default_rate_predictions WHERE company_id = ? ORDER BY id DESC'
      )
      .all(company.id)
      .map(
        (row): PredictionRecord => ({
          id: row.id,
          companyId: row.company_id,
          riskLevel: row.risk_level,
          confidence: row.confidence,
          probability: row.probability,
          ratios: readRatios(row),
          predictedAt: row.predicted_at,
        })
      );

    const ratios = db
      .prepare<[number], RatioRow>(
        'SELECT * FROM financial_ratios WHERE company_id = ? ORDER BY id DESC'
      )
      .all(company.id)
      .map(
        (row): RatioSnapshot => ({
          id: row.id,
          companyId: row.company_id,
          ratios: readRatios(row),
          createdAt: row.created_at,
        })
      );

    return { company, predictions, ratios };
  }

  private selectCompany(db: Database.Database, symbol: string): Company | undefined {
    const row = db
      .prepare<[string], CompanyRow>('SELECT * FROM companies WHERE symbol = ?')
      .get(symbol);
    return row ? toCompany(row) : undefined;
  }
}

function toCompany(row: CompanyRow): Company {
  return {
    id: row.id,
    symbol: row.symbol,
    name: row.name,
    marketCap: row.market_cap,
    sector: row.sector,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function readRatios(row: FinancialRatios): FinancialRatios {
  const ratios = emptyRatios();
  for (const field of RATIO_FIELDS) {
    ratios[field] = row[field] ?? null;
  }
  return ratios;
}

function isUniqueViolation(err: unknown): boolean {
  return (
    err instanceof Database.SqliteError &&
    (err.code === 'SQLITE_CONSTRAINT_UNIQUE' || err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
