import { Injectable, Logger } from '@nestjs/common';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { BatchSummary, DatasetRef } from '@riskline/shared-models';
import { CleanupError, describeError } from '../common/errors';
import { BatchValidatorService } from '../ingestion/batch-validator.service';
import { DatasetReaderService } from '../ingestion/dataset-reader.service';
import { DatasetRow } from '../ingestion/dataset-schema';
import { UploadStagingService } from '../ingestion/upload-staging.service';
import { DatabaseService } from '../persistence/database.service';
import { EntityStoreService } from '../persistence/entity-store.service';
import { PersistenceSession } from '../persistence/persistence-session';
import { RiskScoringService } from '../scoring/risk-scoring.service';
import { RecordError } from './pipeline.errors';
import { extractRecord } from './record-extractor';

/** Failures reported individually in a summary; the rest are only counted */
export const MAX_REPORTED_ERRORS = 5;

/**
 * Processes one staged dataset end to end.
 *
 * Steps:
 * 1. Open a persistence session for the whole batch
 * 2. Read and validate the dataset (a schema failure aborts the batch)
 * 3. For each record, in order: extract → resolve company → score → persist → commit
 * 4. Roll back and count any record that fails, then carry on
 * 5. Release the session and delete the staged file, whatever happened
 */
@Injectable()
export class BatchPipelineService {
  private readonly logger = new Logger(BatchPipelineService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly reader: DatasetReaderService,
    private readonly validator: BatchValidatorService,
    private readonly entityStore: EntityStoreService,
    private readonly scoring: RiskScoringService,
    private readonly staging: UploadStagingService
  ) {}

  async run(ref: DatasetRef): Promise<BatchSummary> {
    const startMs = Date.now();
    this.logger.log(`Batch starting for "${ref.fileName}"`);

    try {
      const summary = await this.database.withSession((session) =>
        this.processDataset(session, ref)
      );

      this.logger.log(
        `Batch "${ref.fileName}" complete in ${Date.now() - startMs}ms: ` +
          `${summary.processed} processed, ${summary.succeeded} succeeded, ${summary.failed} failed`
      );
      return summary;
    } catch (err) {
      this.logger.error(`Batch "${ref.fileName}" aborted: ${describeError(err)}`);
      throw err;
    } finally {
      this.discardArtifact(ref);
    }
  }

  private async processDataset(
    session: PersistenceSession,
    ref: DatasetRef
  ): Promise<BatchSummary> {
    const summary: BatchSummary = { processed: 0, succeeded: 0, failed: 0, errors: [] };

    const dataset = this.validator.validate(this.reader.read(ref));
    this.logger.log(`"${ref.fileName}": ${dataset.rows.length} records to process`);

    for (const row of dataset.rows) {
      summary.processed++;
      const recordNumber = summary.processed;

      try {
        this.processRecord(session, row);
        summary.succeeded++;
      } catch (err) {
        session.rollback();
        summary.failed++;

        const failure = new RecordError(recordNumber, err);
        if (summary.errors.length < MAX_REPORTED_ERRORS) {
          summary.errors.push(failure.message);
        }
        this.logger.warn(`"${ref.fileName}" ${failure.message}`);
      }

      // Let other workers' batches progress between records.
      await yieldToEventLoop();
    }

    Object.freeze(summary.errors);
    return Object.freeze(summary);
  }

  /**
   * One record as one unit of work. Everything between begin and commit is
   * synchronous, so a record is either fully committed or not at all.
   */
  private processRecord(session: PersistenceSession, row: DatasetRow): void {
    const record = extractRecord(row);

    session.begin();
    const company = this.entityStore.resolve(session, {
      symbol: record.symbol,
      name: record.name,
      marketCap: record.marketCap,
      sector: record.sector,
    });
    const score = this.scoring.score(record.ratios);
    this.entityStore.savePrediction(session, company.id, score);
    this.entityStore.saveRatios(session, company.id, record.ratios);
    session.commit();

    this.logger.debug(`${record.symbol}: ${score.riskLevel} (p=${score.probability})`);
  }

  private discardArtifact(ref: DatasetRef): void {
    try {
      this.staging.remove(ref);
    } catch (err) {
      this.logger.warn(new CleanupError(`staged file ${ref.path}`, err).message);
    }
  }
}
