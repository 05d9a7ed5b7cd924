/** Injection token for the active {@link JobBroker} */
export const JOB_BROKER = Symbol('JOB_BROKER');

/**
 * A job as it travels through the broker.
 */
export interface BrokerMessage {
  jobId: string;

  /** When the job first entered the queue */
  enqueuedAt: string;

  /** Times this message has been handed to a worker */
  deliveries: number;
}

export interface BrokerSnapshot {
  /** Waiting for a worker, oldest first */
  queued: BrokerMessage[];

  /** Delivered and not yet acknowledged, per worker */
  reserved: Record<string, BrokerMessage[]>;
}

/**
 * At-least-once job queue between the dispatcher and the worker pool.
 *
 * A reserved message stays owned by its worker until acknowledged. If the
 * worker is lost first, {@link releaseWorker} puts it back for redelivery.
 */
export interface JobBroker {
  /** Queue a job. Throws BrokerUnavailableError when not accepting work. */
  enqueue(jobId: string): BrokerMessage;

  /**
   * Wait for the next job for `workerId`. Resolves with `null` when the
   * wait is cancelled or the broker closes.
   */
  reserve(workerId: string): Promise<BrokerMessage | null>;

  /** Cancel a pending {@link reserve} for one worker */
  cancelReserve(workerId: string): void;

  /** Acknowledge a finished job, removing it from the worker's reservations */
  ack(workerId: string, jobId: string): void;

  /** Requeue everything a lost worker had reserved. Returns the count. */
  releaseWorker(workerId: string): number;

  ping(): boolean;

  snapshot(): BrokerSnapshot;

  close(): void;
}
