export * from './lib/batch.interface';
export * from './lib/job.interface';
export * from './lib/entity.interface';
export * from './lib/health.interface';
