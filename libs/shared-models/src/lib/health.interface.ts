/**
 * Interfaces for the liveness and diagnostics probes.
 */

/** Lifecycle state of a worker loop */
export type WorkerState = 'IDLE' | 'BUSY' | 'STOPPING' | 'STOPPED';

export interface HealthReport {
  status: 'ok' | 'degraded';
  store: { reachable: boolean };
  broker: { reachable: boolean; queued: number };
  workers: { count: number; names: string[] };
  checkedAt: string;
}

/**
 * Short description of a job as seen from the broker.
 */
export interface JobBrief {
  id: string;
  fileName: string;
  submittedAt: string;
}

export interface WorkerDiagnostics {
  state: WorkerState;

  /** Job currently running on this worker */
  active: JobBrief[];

  /** Jobs delivered to this worker and not yet acknowledged */
  reserved: JobBrief[];

  /** Jobs this worker has finished since start */
  processedJobs: number;

  /** Times the worker loop was restarted after a crash */
  restarts: number;
}

export interface DiagnosticsReport {
  workers: Record<string, WorkerDiagnostics>;

  /** Jobs waiting in the queue */
  scheduled: JobBrief[];
}
