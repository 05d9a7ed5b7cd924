import { Module } from '@nestjs/common';
import { BatchValidatorService } from './batch-validator.service';
import { DatasetReaderService } from './dataset-reader.service';
import { UploadStagingService } from './upload-staging.service';

@Module({
  providers: [DatasetReaderService, BatchValidatorService, UploadStagingService],
  exports: [DatasetReaderService, BatchValidatorService, UploadStagingService],
})
export class IngestionModule {}
