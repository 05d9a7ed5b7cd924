import { BatchSummary } from './batch.interface';

/** Lifecycle of a dispatched batch */
export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed';

/**
 * Reference to a staged dataset artifact awaiting processing.
 */
export interface DatasetRef {
  /** Absolute path of the staged file */
  path: string;

  /** File name as uploaded by the client */
  fileName: string;
}

/**
 * Returned to the submitter as soon as a job is queued.
 */
export interface JobHandle {
  id: string;
  status: JobStatus;
  submittedAt: string;
}

/** Classification of a terminal job failure */
export type JobErrorType = 'SchemaError' | 'DatasetReadError' | 'PipelineError';

/**
 * Why a job ended in `failed`.
 */
export interface JobError {
  type: JobErrorType;
  message: string;

  /** Required columns absent from the dataset (SchemaError only) */
  missingColumns?: string[];
}

/**
 * Full job record as reported by the status lookup.
 */
export interface JobStatusView {
  id: string;
  status: JobStatus;
  fileName: string;
  submittedAt: string;
  startedAt?: string;
  finishedAt?: string;

  /** Worker that ran (or is running) the job */
  workerId?: string;

  /** How many times the broker handed this job to a worker */
  deliveries: number;

  /** Present once the job has succeeded */
  result?: BatchSummary;

  /** Present once the job has failed */
  error?: JobError;
}

/**
 * Request body for a bulk prediction upload.
 */
export interface BulkPredictionRequest {
  fileName: string;

  /** Spreadsheet bytes, base64 encoded */
  contentBase64: string;
}
