import { describeError } from '../common/errors';

/**
 * The broker is not accepting messages (closed or unreachable).
 */
export class BrokerUnavailableError extends Error {
  constructor(reason: string) {
    super(`Job broker unavailable: ${reason}`);
    this.name = 'BrokerUnavailableError';
  }
}

/**
 * A job could not be handed to the broker. The pipeline never ran.
 */
export class DispatchError extends Error {
  constructor(
    readonly fileName: string,
    cause: unknown
  ) {
    super(`Could not dispatch "${fileName}": ${describeError(cause)}`, { cause });
    this.name = 'DispatchError';
  }
}
