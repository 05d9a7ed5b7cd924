export * from './batch-pipeline.service';
export * from './pipeline.errors';
export * from './pipeline.module';
export * from './record-extractor';
