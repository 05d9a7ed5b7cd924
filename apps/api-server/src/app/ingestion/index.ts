export * from './batch-validator.service';
export * from './dataset-reader.service';
export * from './dataset-schema';
export * from './ingestion.errors';
export * from './ingestion.module';
export * from './upload-staging.service';
