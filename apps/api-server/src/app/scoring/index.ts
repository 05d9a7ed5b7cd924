export * from './risk-scoring.service';
export * from './scoring.errors';
export * from './scoring.module';
