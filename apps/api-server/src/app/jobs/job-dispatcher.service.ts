import { Inject, Injectable, Logger } from '@nestjs/common';
import { DatasetRef, JobHandle, JobStatusView } from '@riskline/shared-models';
import { JOB_BROKER, JobBroker } from './job-broker';
import { JobStoreService, toHandle } from './job-store.service';
import { DispatchError } from './jobs.errors';

/**
 * Hands staged datasets to the broker and answers status lookups.
 * Never waits for a worker.
 */
@Injectable()
export class JobDispatcherService {
  private readonly logger = new Logger(JobDispatcherService.name);

  constructor(
    @Inject(JOB_BROKER) private readonly broker: JobBroker,
    private readonly jobStore: JobStoreService
  ) {}

  /**
   * Queue a batch. Throws {@link DispatchError} if the broker refuses it,
   * in which case no job record remains.
   */
  submit(datasetRef: DatasetRef): JobHandle {
    const job = this.jobStore.create(datasetRef);

    try {
      this.broker.enqueue(job.id);
    } catch (err) {
      this.jobStore.remove(job.id);
      const failure = new DispatchError(datasetRef.fileName, err);
      this.logger.error(failure.message);
      throw failure;
    }

    this.logger.log(`Job ${job.id} queued for "${datasetRef.fileName}"`);
    return toHandle(job);
  }

  status(jobId: string): JobStatusView | undefined {
    return this.jobStore.view(jobId);
  }

  list(limit?: number): JobStatusView[] {
    return this.jobStore.list(limit);
  }
}
