/**
 * Best-effort one-line description of a thrown value.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  if (typeof err === 'string') {
    return err;
  }
  return 'Unknown error';
}

/**
 * Failure while releasing a resource after a batch. Only ever logged.
 */
export class CleanupError extends Error {
  constructor(
    readonly resource: string,
    cause: unknown
  ) {
    super(`Cleanup of ${resource} failed: ${describeError(cause)}`, { cause });
    this.name = 'CleanupError';
  }
}
