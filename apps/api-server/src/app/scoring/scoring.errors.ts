import { RatioField } from '@riskline/shared-models';

/**
 * The scoring function rejected its input.
 */
export class ScoringError extends Error {
  constructor(
    message: string,
    readonly field?: RatioField
  ) {
    super(message);
    this.name = 'ScoringError';
  }
}
