import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { ScoringModule } from '../scoring/scoring.module';
import { BatchPipelineService } from './batch-pipeline.service';

@Module({
  imports: [IngestionModule, PersistenceModule, ScoringModule],
  providers: [BatchPipelineService],
  exports: [BatchPipelineService],
})
export class PipelineModule {}
