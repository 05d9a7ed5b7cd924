import { LogLevel } from '@nestjs/common';
import { z } from 'zod';

/** Injection token for the validated configuration */
export const APP_CONFIG = Symbol('APP_CONFIG');

const LOG_LEVELS = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'] as const;

const booleanFlag = z
  .enum(['true', 'false', 'True', 'False', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === 'True' || v === '1');

const configSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  API_PREFIX: z.string().min(1).default('api'),
  CORS_ORIGIN: z.string().min(1).default('http://localhost:3000'),
  DEBUG: booleanFlag,
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
  DATABASE_PATH: z.string().min(1).default('data/riskline.db'),
  DATABASE_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  STAGING_DIR: z.string().min(1).default('data/staging'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(2),
  WORKER_NAME_PREFIX: z.string().min(1).default('worker'),
  ENTITY_CONFLICT_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  JOB_HISTORY_LIMIT: z.coerce.number().int().positive().default(500),
});

export interface AppConfig {
  port: number;
  apiPrefix: string;
  corsOrigin: string;
  debug: boolean;
  logLevels: LogLevel[];
  database: {
    path: string;
    busyTimeoutMs: number;
  };
  staging: {
    directory: string;
    maxUploadBytes: number;
  };
  workers: {
    concurrency: number;
    namePrefix: string;
  };
  entityConflictRetries: number;
  jobHistoryLimit: number;
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse and validate environment variables into an {@link AppConfig}.
 * Unknown variables are ignored.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }

  const c = parsed.data;
  return {
    port: c.PORT,
    apiPrefix: c.API_PREFIX,
    corsOrigin: c.CORS_ORIGIN,
    debug: c.DEBUG,
    logLevels: logLevelsFrom(c.LOG_LEVEL),
    database: {
      path: c.DATABASE_PATH,
      busyTimeoutMs: c.DATABASE_BUSY_TIMEOUT_MS,
    },
    staging: {
      directory: c.STAGING_DIR,
      maxUploadBytes: c.MAX_UPLOAD_BYTES,
    },
    workers: {
      concurrency: c.WORKER_CONCURRENCY,
      namePrefix: c.WORKER_NAME_PREFIX,
    },
    entityConflictRetries: c.ENTITY_CONFLICT_RETRIES,
    jobHistoryLimit: c.JOB_HISTORY_LIMIT,
  };
}

/** Enabled levels: the chosen one and everything more severe */
function logLevelsFrom(level: (typeof LOG_LEVELS)[number]): LogLevel[] {
  return LOG_LEVELS.slice(LOG_LEVELS.indexOf(level));
}
