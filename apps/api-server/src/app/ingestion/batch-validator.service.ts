import { Injectable, Logger } from '@nestjs/common';
import {
  DATASET_COLUMNS,
  DatasetColumn,
  DatasetRow,
  NormalizedDataset,
  RawDataset,
  REQUIRED_COLUMNS,
} from './dataset-schema';
import { SchemaError } from './ingestion.errors';

const KNOWN_COLUMNS: ReadonlyMap<string, DatasetColumn> = new Map(
  DATASET_COLUMNS.map((c) => [c, c])
);

/**
 * Checks a raw dataset's header and maps it onto the fixed column set.
 * Header matching is case-insensitive.
 */
@Injectable()
export class BatchValidatorService {
  private readonly logger = new Logger(BatchValidatorService.name);

  validate(raw: RawDataset): NormalizedDataset {
    const lowered = raw.columns.map((c) => c.toLowerCase());

    const missing = REQUIRED_COLUMNS.filter((c) => !lowered.includes(c)).sort();
    if (missing.length > 0) {
      this.logger.warn(`Dataset rejected, missing required columns: ${missing.join(', ')}`);
      throw new SchemaError(missing, REQUIRED_COLUMNS);
    }

    // Column index for each recognised field; the first occurrence wins.
    const positions = new Map<DatasetColumn, number>();
    const ignoredColumns: string[] = [];
    lowered.forEach((name, index) => {
      const column = KNOWN_COLUMNS.get(name);
      if (!column) {
        if (name !== '') ignoredColumns.push(name);
        return;
      }
      if (positions.has(column)) {
        this.logger.warn(`Duplicate column "${raw.columns[index]}" ignored`);
        return;
      }
      positions.set(column, index);
    });

    if (ignoredColumns.length > 0) {
      this.logger.debug(`Unrecognised columns ignored: ${ignoredColumns.join(', ')}`);
    }

    const rows = raw.rows.map((cells) => {
      const row: DatasetRow = {};
      for (const [column, index] of positions) {
        row[column] = cells[index];
      }
      return row;
    });

    return {
      columns: Array.from(positions.keys()),
      ignoredColumns,
      rows,
    };
  }
}
