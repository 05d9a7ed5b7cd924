import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import * as os from 'os';
import { JobError, WorkerState } from '@riskline/shared-models';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { describeError } from '../common/errors';
import { DatasetReadError, SchemaError } from '../ingestion/ingestion.errors';
import { BatchPipelineService } from '../pipeline/batch-pipeline.service';
import { BrokerMessage, JOB_BROKER, JobBroker } from './job-broker';
import { JobStoreService } from './job-store.service';

export interface PoolWorker {
  id: string;
  state: WorkerState;
  currentJobId?: string;
  processedJobs: number;

  /** Times the loop was restarted after crashing */
  restarts: number;
  startedAt: string;
}

interface RunningWorker extends PoolWorker {
  loop: Promise<void>;
}

/**
 * Runs N independent worker loops. Each loop takes one job at a time from the
 * broker and runs the batch pipeline to completion before taking the next.
 */
@Injectable()
export class WorkerPoolService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(WorkerPoolService.name);

  private workers = new Map<string, RunningWorker>();

  private running = false;

  constructor(
    @Inject(JOB_BROKER) private readonly broker: JobBroker,
    private readonly jobStore: JobStoreService,
    private readonly pipeline: BatchPipelineService,
    @Inject(APP_CONFIG) private readonly config: AppConfig
  ) {}

  onApplicationBootstrap(): void {
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(concurrency = this.config.workers.concurrency): void {
    if (this.running) {
      this.logger.warn('Worker pool already running');
      return;
    }
    this.running = true;
    this.workers.clear();

    const host = os.hostname();
    for (let i = 1; i <= concurrency; i++) {
      const id = `${this.config.workers.namePrefix}-${i}@${host}`;
      const worker: RunningWorker = {
        id,
        state: 'IDLE',
        processedJobs: 0,
        restarts: 0,
        startedAt: new Date().toISOString(),
        loop: Promise.resolve(),
      };
      this.workers.set(id, worker);
      this.launch(worker);
    }

    this.logger.log(`Worker pool started with ${concurrency} worker(s)`);
  }

  /**
   * Stop taking new jobs and wait for in-flight ones to finish.
   * Queued jobs stay in the broker.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    for (const worker of this.workers.values()) {
      if (worker.state !== 'STOPPED') {
        worker.state = worker.state === 'BUSY' ? 'STOPPING' : 'STOPPED';
      }
      this.broker.cancelReserve(worker.id);
    }

    await Promise.all(Array.from(this.workers.values()).map((w) => w.loop));
    this.logger.log('Worker pool stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Snapshot of every worker for diagnostics */
  getWorkers(): PoolWorker[] {
    return Array.from(this.workers.values()).map((w) => ({
      id: w.id,
      state: w.state,
      currentJobId: w.currentJobId,
      processedJobs: w.processedJobs,
      restarts: w.restarts,
      startedAt: w.startedAt,
    }));
  }

  /** Workers whose loop is still alive */
  getLiveWorkers(): PoolWorker[] {
    return this.getWorkers().filter((w) => w.state === 'IDLE' || w.state === 'BUSY');
  }

  private launch(worker: RunningWorker): void {
    worker.state = 'IDLE';
    worker.loop = this.runWorker(worker).catch((err) => this.onWorkerCrash(worker, err));
  }

  private async runWorker(worker: RunningWorker): Promise<void> {
    this.logger.debug(`Worker ${worker.id} waiting for jobs`);

    while (this.running) {
      const message = await this.broker.reserve(worker.id);
      if (!message) break;
      await this.execute(worker, message);
    }

    worker.state = 'STOPPED';
    this.logger.debug(`Worker ${worker.id} stopped`);
  }

  private async execute(worker: RunningWorker, message: BrokerMessage): Promise<void> {
    const job = this.jobStore.get(message.jobId);
    if (!job) {
      this.logger.warn(`Worker ${worker.id} received unknown job ${message.jobId}; dropping`);
      this.broker.ack(worker.id, message.jobId);
      return;
    }

    worker.state = 'BUSY';
    worker.currentJobId = job.id;
    this.jobStore.markRunning(job.id, worker.id, message.deliveries);
    this.logger.log(`Worker ${worker.id} picked up job ${job.id} ("${job.fileName}")`);

    try {
      const summary = await this.pipeline.run(job.datasetRef);
      this.jobStore.markSucceeded(job.id, summary);
    } catch (err) {
      this.jobStore.markFailed(job.id, toJobError(err));
    } finally {
      worker.processedJobs++;
      worker.currentJobId = undefined;
      worker.state = this.running ? 'IDLE' : 'STOPPING';
      this.broker.ack(worker.id, job.id);
    }
  }

  private onWorkerCrash(worker: RunningWorker, err: unknown): void {
    worker.state = 'STOPPED';
    worker.currentJobId = undefined;
    const requeued = this.broker.releaseWorker(worker.id);
    this.logger.error(
      `Worker ${worker.id} crashed: ${describeError(err)} (${requeued} job(s) requeued)`
    );

    // Deferred so a job that keeps crashing its worker still yields to other work.
    setImmediate(() => {
      if (!this.running || this.workers.get(worker.id) !== worker) return;
      worker.restarts++;
      this.logger.error(`Restarting worker ${worker.id} (restart ${worker.restarts})`);
      this.launch(worker);
    });
  }
}

/** Terminal job error for a pipeline failure */
export function toJobError(err: unknown): JobError {
  if (err instanceof SchemaError) {
    return { type: 'SchemaError', message: err.message, missingColumns: [...err.missingColumns] };
  }
  if (err instanceof DatasetReadError) {
    return { type: 'DatasetReadError', message: err.message };
  }
  return { type: 'PipelineError', message: describeError(err) };
}
