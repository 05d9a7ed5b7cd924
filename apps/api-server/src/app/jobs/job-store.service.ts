import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BatchSummary,
  DatasetRef,
  JobError,
  JobHandle,
  JobStatus,
  JobStatusView,
} from '@riskline/shared-models';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { describeError } from '../common/errors';

/**
 * Internal job record: the public view plus where its dataset is staged.
 */
export interface JobRecord extends JobStatusView {
  datasetRef: DatasetRef;
}

export type JobListener = (job: JobStatusView) => void;

const TERMINAL: ReadonlySet<JobStatus> = new Set(['succeeded', 'failed']);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Job lifecycle store: pending → running → succeeded | failed.
 * Single source of truth for job status and results.
 */
@Injectable()
export class JobStoreService {
  private readonly logger = new Logger(JobStoreService.name);

  /** All jobs by ID, in submission order */
  private jobs = new Map<string, JobRecord>();

  private listeners = new Set<JobListener>();

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  create(datasetRef: DatasetRef): JobRecord {
    const job: JobRecord = {
      id: this.generateJobId(),
      status: 'pending',
      fileName: datasetRef.fileName,
      submittedAt: new Date().toISOString(),
      deliveries: 0,
      datasetRef,
    };

    this.jobs.set(job.id, job);
    this.prune();
    this.logger.debug(`Job created: ${job.id} ("${job.fileName}")`);
    this.notify(job);
    return job;
  }

  get(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  view(jobId: string): JobStatusView | undefined {
    const job = this.jobs.get(jobId);
    return job ? toView(job) : undefined;
  }

  /** Most recent jobs first */
  list(limit = 50): JobStatusView[] {
    return Array.from(this.jobs.values()).reverse().slice(0, limit).map(toView);
  }

  remove(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  markRunning(jobId: string, workerId: string, deliveries: number): JobRecord | undefined {
    return this.transition(jobId, 'running', {
      workerId,
      deliveries,
      startedAt: new Date().toISOString(),
    });
  }

  markSucceeded(jobId: string, result: BatchSummary): JobRecord | undefined {
    return this.transition(jobId, 'succeeded', {
      result,
      finishedAt: new Date().toISOString(),
    });
  }

  markFailed(jobId: string, error: JobError): JobRecord | undefined {
    return this.transition(jobId, 'failed', {
      error,
      finishedAt: new Date().toISOString(),
    });
  }

  /**
   * Register a listener for status changes. Returns an unsubscribe function.
   */
  onChange(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transition(
    jobId: string,
    status: JobStatus,
    updates: Partial<JobRecord>
  ): JobRecord | undefined {
    const job = this.jobs.get(jobId);
    if (!job) {
      this.logger.warn(`Job not found for status update: ${jobId}`);
      return undefined;
    }

    const updated: JobRecord = { ...job, ...updates, status };
    this.jobs.set(jobId, updated);
    this.logger.debug(`Job ${jobId} status: ${job.status} → ${status}`);

    this.notify(updated);
    return updated;
  }

  private notify(job: JobRecord): void {
    const view = toView(job);
    for (const listener of this.listeners) {
      try {
        listener(view);
      } catch (err) {
        this.logger.warn(`Job listener failed for ${job.id}: ${describeError(err)}`);
      }
    }
  }

  /** Drop the oldest finished jobs once over the history limit */
  private prune(): void {
    let excess = this.jobs.size - this.config.jobHistoryLimit;
    if (excess <= 0) return;

    for (const [id, job] of this.jobs) {
      if (excess <= 0) break;
      if (isTerminal(job.status)) {
        this.jobs.delete(id);
        excess--;
      }
    }
  }

  private generateJobId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `JOB-${timestamp}-${random}`;
  }
}

export function toHandle(job: JobRecord): JobHandle {
  return { id: job.id, status: job.status, submittedAt: job.submittedAt };
}

function toView(job: JobRecord): JobStatusView {
  const { datasetRef: _staged, ...view } = job;
  return view;
}
