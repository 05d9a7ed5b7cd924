import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/ingestion.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { InMemoryJobBroker } from './in-memory-job-broker';
import { JOB_BROKER } from './job-broker';
import { JobDispatcherService } from './job-dispatcher.service';
import { JobEventsGateway } from './job-events.gateway';
import { JobStoreService } from './job-store.service';
import { JobsController } from './jobs.controller';
import { WorkerPoolService } from './worker-pool.service';

@Module({
  imports: [IngestionModule, PipelineModule],
  controllers: [JobsController],
  providers: [
    { provide: JOB_BROKER, useClass: InMemoryJobBroker },
    JobStoreService,
    JobDispatcherService,
    WorkerPoolService,
    JobEventsGateway,
  ],
  exports: [JOB_BROKER, JobStoreService, JobDispatcherService, WorkerPoolService],
})
export class JobsModule {}
