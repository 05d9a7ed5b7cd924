import { Controller, Get, Inject, Logger } from '@nestjs/common';
import {
  DiagnosticsReport,
  HealthReport,
  JobBrief,
  WorkerDiagnostics,
} from '@riskline/shared-models';
import { JOB_BROKER, JobBroker } from '../jobs/job-broker';
import { JobStoreService } from '../jobs/job-store.service';
import { WorkerPoolService } from '../jobs/worker-pool.service';
import { DatabaseService } from '../persistence/database.service';

/**
 * Liveness and worker diagnostics. Read-only; nothing here affects processing.
 */
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly database: DatabaseService,
    @Inject(JOB_BROKER) private readonly broker: JobBroker,
    private readonly pool: WorkerPoolService,
    private readonly jobStore: JobStoreService
  ) {}

  /**
   * GET /api/health
   *
   * `degraded` when the store or broker is unreachable or no worker is alive.
   */
  @Get()
  getHealth(): HealthReport {
    const storeReachable = this.database.ping();
    const brokerReachable = this.broker.ping();
    const workers = this.pool.getLiveWorkers();

    const healthy = storeReachable && brokerReachable && workers.length > 0;
    if (!healthy) {
      this.logger.warn(
        `Health degraded (store: ${storeReachable}, broker: ${brokerReachable}, workers: ${workers.length})`
      );
    }

    return {
      status: healthy ? 'ok' : 'degraded',
      store: { reachable: storeReachable },
      broker: {
        reachable: brokerReachable,
        queued: brokerReachable ? this.broker.snapshot().queued.length : 0,
      },
      workers: { count: workers.length, names: workers.map((w) => w.id) },
      checkedAt: new Date().toISOString(),
    };
  }

  /**
   * GET /api/health/diagnostics
   *
   * What each worker is running and holding, plus what is still queued.
   */
  @Get('diagnostics')
  getDiagnostics(): DiagnosticsReport {
    const snapshot = this.broker.snapshot();
    const workers: Record<string, WorkerDiagnostics> = {};

    for (const worker of this.pool.getWorkers()) {
      const held = snapshot.reserved[worker.id] ?? [];
      workers[worker.id] = {
        state: worker.state,
        active: worker.currentJobId ? this.briefs([worker.currentJobId]) : [],
        reserved: this.briefs(
          held.map((m) => m.jobId).filter((id) => id !== worker.currentJobId)
        ),
        processedJobs: worker.processedJobs,
        restarts: worker.restarts,
      };
    }

    return {
      workers,
      scheduled: this.briefs(snapshot.queued.map((m) => m.jobId)),
    };
  }

  private briefs(jobIds: string[]): JobBrief[] {
    return jobIds.map((id) => {
      const job = this.jobStore.get(id);
      return job
        ? { id, fileName: job.fileName, submittedAt: job.submittedAt }
        : { id, fileName: 'unknown', submittedAt: '' };
    });
  }
}
