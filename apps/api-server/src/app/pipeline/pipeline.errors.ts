import { describeError } from '../common/errors';

/**
 * A cell held a value that cannot be used for its column.
 */
export class InvalidFieldError extends Error {
  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
    this.name = 'InvalidFieldError';
  }
}

/**
 * Failure of a single record. Absorbed into the batch summary.
 */
export class RecordError extends Error {
  constructor(
    readonly recordNumber: number,
    cause: unknown
  ) {
    super(`Record ${recordNumber}: ${describeError(cause)}`, { cause });
    this.name = 'RecordError';
  }
}
