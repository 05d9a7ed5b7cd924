/**
 * A company could not be created or found after repeated unique-key conflicts.
 */
export class EntityConflictError extends Error {
  constructor(
    readonly symbol: string,
    readonly attempts: number
  ) {
    super(`Company "${symbol}" could not be resolved after ${attempts} conflicting attempts`);
    this.name = 'EntityConflictError';
  }
}
