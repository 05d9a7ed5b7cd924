export * from './jobs.errors';
export * from './job-broker';
export * from './in-memory-job-broker';
export * from './job-store.service';
export * from './job-dispatcher.service';
export * from './worker-pool.service';
export * from './job-events.gateway';
export * from './jobs.controller';
export * from './jobs.module';
