import { Module } from '@nestjs/common';
import { PersistenceModule } from '../persistence/persistence.module';
import { EntitiesController } from './entities.controller';

@Module({
  imports: [PersistenceModule],
  controllers: [EntitiesController],
})
export class EntitiesModule {}
