export * from './database.service';
export * from './entity-store.service';
export * from './persistence-session';
export * from './persistence.errors';
export * from './persistence.module';
