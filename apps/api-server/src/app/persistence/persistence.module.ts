import { Module } from '@nestjs/common';
import { DatabaseService } from './database.service';
import { EntityStoreService } from './entity-store.service';

@Module({
  providers: [DatabaseService, EntityStoreService],
  exports: [DatabaseService, EntityStoreService],
})
export class PersistenceModule {}
