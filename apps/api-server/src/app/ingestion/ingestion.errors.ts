/**
 * The dataset lacks required columns. Fatal for the whole batch.
 */
export class SchemaError extends Error {
  constructor(
    readonly missingColumns: string[],
    readonly requiredColumns: readonly string[]
  ) {
    super(
      `Dataset is missing required columns: ${missingColumns.join(', ')}. ` +
        `Required columns are: ${requiredColumns.join(', ')}.`
    );
    this.name = 'SchemaError';
  }
}

/**
 * The staged file could not be opened or parsed as a spreadsheet.
 */
export class DatasetReadError extends Error {
  constructor(
    readonly fileName: string,
    reason: string,
    cause?: unknown
  ) {
    super(`Could not read dataset "${fileName}": ${reason}`, { cause });
    this.name = 'DatasetReadError';
  }
}
