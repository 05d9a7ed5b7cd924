import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { FinancialRatios, RiskLevel, ScoreResult } from '@riskline/shared-models';
import { RATIO_FIELDS } from '../common/financial-ratios';
import {
  BASE_CONFIDENCE,
  COVERAGE_CONFIDENCE,
  INTERCEPT,
  MODEL_VERSION,
  RATIO_TERMS,
  RISK_BANDS,
  TERM_LIMIT,
} from './risk-model';
import { ScoringError } from './scoring.errors';

/**
 * Default-risk scoring: ratios → risk level, confidence and probability.
 *
 * Absent ratios (`null`) contribute nothing to the score and lower the
 * confidence. Pure and synchronous; safe to call inside a transaction.
 */
@Injectable()
export class RiskScoringService implements OnModuleInit {
  private readonly logger = new Logger(RiskScoringService.name);

  /** Run one prediction at boot so a broken model fails fast */
  onModuleInit(): void {
    const sample = this.score({
      debt_to_equity_ratio: 0.5,
      current_ratio: 2.0,
      quick_ratio: 1.5,
      return_on_equity: 0.15,
      return_on_assets: 0.08,
      profit_margin: 0.1,
      interest_coverage: 5.0,
      fixed_asset_turnover: 1.2,
      total_debt_ebitda: 2.5,
    });
    this.logger.log(
      `Scoring model ${MODEL_VERSION} ready (warm-up: ${sample.riskLevel}, p=${sample.probability})`
    );
  }

  score(ratios: FinancialRatios): ScoreResult {
    let logit = INTERCEPT;
    let present = 0;

    for (const field of RATIO_FIELDS) {
      const value = ratios[field];
      if (value === null) continue;

      if (!Number.isFinite(value)) {
        throw new ScoringError(`Ratio ${field} must be a finite number, got ${value}`, field);
      }

      const term = RATIO_TERMS[field];
      logit += clamp(term.weight * (value - term.neutral), -TERM_LIMIT, TERM_LIMIT);
      present++;
    }

    const probability = round4(1 / (1 + Math.exp(-logit)));
    const confidence = round4(
      BASE_CONFIDENCE + COVERAGE_CONFIDENCE * (present / RATIO_FIELDS.length)
    );

    return Object.freeze({
      riskLevel: levelFor(probability),
      confidence,
      probability,
      ratios: Object.freeze({ ...ratios }),
    });
  }
}

function levelFor(probability: number): RiskLevel {
  const band = RISK_BANDS.find((b) => probability < b.below);
  return band ? band.level : 'CRITICAL';
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
