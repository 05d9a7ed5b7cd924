import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { PersistenceModule } from '../persistence/persistence.module';
import { HealthController } from './health.controller';

@Module({
  imports: [PersistenceModule, JobsModule],
  controllers: [HealthController],
})
export class HealthModule {}
