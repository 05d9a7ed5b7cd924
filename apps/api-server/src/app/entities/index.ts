export * from './entities.controller';
export * from './entities.module';
