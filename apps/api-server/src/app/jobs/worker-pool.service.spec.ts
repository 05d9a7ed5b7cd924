import * as fs from 'fs';
import * as os from 'os';
import {
  createJobsFixture,
  JobsFixture,
  waitForCondition,
  waitForJob,
} from '../../testing/job-helpers';
import { COMPANY_HEADER, companyRow, RATIO_HEADER } from '../../testing/workbook';
import { DatasetReadError, SchemaError } from '../ingestion/ingestion.errors';
import { toJobError } from './worker-pool.service';

describe('WorkerPoolService', () => {
  let fx: JobsFixture;

  beforeEach(() => {
    fx = createJobsFixture();
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fx.shutdown();
  });

  it('runs a submitted batch and records its summary', async () => {
    fx.pool.start();
    const ref = fx.stage('valid.xlsx', [
      COMPANY_HEADER,
      companyRow('AAA', 'Alpha'),
      companyRow('BBB', 'Beta'),
    ]);

    const handle = fx.dispatcher.submit(ref);
    const job = await waitForJob(fx.jobStore, handle.id);

    expect(job.status).toBe('succeeded');
    expect(job.result).toEqual({ processed: 2, succeeded: 2, failed: 0, errors: [] });
    expect(job.deliveries).toBe(1);
    expect(job.workerId).toMatch(/^worker-[12]@/);
    expect(fs.existsSync(ref.path)).toBe(false);
  });

  it('fails a job whose dataset lacks a key column', async () => {
    fx.pool.start();
    const ref = fx.stage('no-symbol.xlsx', [
      ['company_name', ...RATIO_HEADER],
      ['Alpha', 1.2, 1.8, 1.1, 0.14, 0.07, 0.09, 6, 1.4, 2.1],
    ]);

    const job = await waitForJob(fx.jobStore, fx.dispatcher.submit(ref).id);

    expect(job.status).toBe('failed');
    expect(job.result).toBeUndefined();
    expect(job.error).toEqual({
      type: 'SchemaError',
      message:
        'Dataset is missing required columns: stock_symbol. ' +
        'Required columns are: stock_symbol, company_name.',
      missingColumns: ['stock_symbol'],
    });
    expect(fx.entityStore.countEntities()).toBe(0);
  });

  it('fails a job whose staged file has disappeared', async () => {
    fx.pool.start();
    const handle = fx.dispatcher.submit({
      path: `${fx.workspace.dir}/missing.xlsx`,
      fileName: 'missing.xlsx',
    });

    const job = await waitForJob(fx.jobStore, handle.id);

    expect(job.status).toBe('failed');
    expect(job.error?.type).toBe('DatasetReadError');
  });

  it('leaves jobs pending and queued until a worker is available', async () => {
    const ref = fx.stage('early.xlsx', [COMPANY_HEADER, companyRow('AAA', 'Alpha')]);
    const handle = fx.dispatcher.submit(ref);

    expect(fx.dispatcher.status(handle.id)?.status).toBe('pending');
    expect(fx.broker.snapshot().queued.map((m) => m.jobId)).toEqual([handle.id]);

    fx.pool.start();
    const job = await waitForJob(fx.jobStore, handle.id);
    expect(job.status).toBe('succeeded');
  });

  it('names workers after the prefix and host', () => {
    fx.pool.start();

    expect(fx.pool.getWorkers().map((w) => w.id)).toEqual([
      `worker-1@${os.hostname()}`,
      `worker-2@${os.hostname()}`,
    ]);
    expect(fx.pool.getLiveWorkers()).toHaveLength(2);
  });

  describe('when a worker loop crashes', () => {
    const crashOnce = () => {
      const markRunning = fx.jobStore.markRunning.bind(fx.jobStore);
      jest
        .spyOn(fx.jobStore, 'markRunning')
        .mockImplementationOnce(() => {
          throw new Error('worker lost');
        })
        .mockImplementation(markRunning);
    };

    it('redelivers its job and restores full strength', async () => {
      crashOnce();
      fx.pool.start();
      const ref = fx.stage('retry.xlsx', [COMPANY_HEADER, companyRow('AAA', 'Alpha')]);
      const job = await waitForJob(fx.jobStore, fx.dispatcher.submit(ref).id);

      expect(job.status).toBe('succeeded');
      expect(job.deliveries).toBe(2);
      expect(fx.predictionCount('AAA')).toBe(1);

      await waitForCondition(() => fx.pool.getLiveWorkers().length === 2);
      expect(fx.pool.getWorkers().map((w) => w.restarts)).toEqual([1, 0]);
    });

    it('keeps a single-worker pool taking jobs', async () => {
      crashOnce();
      fx.pool.start(1);

      const first = fx.dispatcher.submit(
        fx.stage('first.xlsx', [COMPANY_HEADER, companyRow('AAA', 'Alpha')])
      );
      const retried = await waitForJob(fx.jobStore, first.id);
      const next = await waitForJob(
        fx.jobStore,
        fx.dispatcher.submit(fx.stage('next.xlsx', [COMPANY_HEADER, companyRow('BBB', 'Beta')])).id
      );

      expect(retried).toMatchObject({ status: 'succeeded', deliveries: 2 });
      expect(next).toMatchObject({ status: 'succeeded', deliveries: 1 });
      expect(fx.pool.getWorkers()).toEqual([
        expect.objectContaining({ state: 'IDLE', restarts: 1, processedJobs: 2 }),
      ]);
    });
  });

  it('finishes in-flight work on stop and takes nothing new', async () => {
    fx.pool.start(1);
    const ref = fx.stage('inflight.xlsx', [COMPANY_HEADER, companyRow('AAA', 'Alpha')]);
    const handle = fx.dispatcher.submit(ref);

    await fx.pool.stop();

    expect(fx.dispatcher.status(handle.id)?.status).toBe('succeeded');
    expect(fx.pool.isRunning).toBe(false);
    expect(fx.pool.getWorkers().map((w) => w.state)).toEqual(['STOPPED']);

    const late = fx.dispatcher.submit(fx.stage('late.xlsx', [COMPANY_HEADER]));
    expect(fx.dispatcher.status(late.id)?.status).toBe('pending');
  });

  it('counts processed jobs per worker', async () => {
    fx.pool.start(1);
    for (const name of ['a.xlsx', 'b.xlsx']) {
      const ref = fx.stage(name, [COMPANY_HEADER, companyRow('AAA', 'Alpha')]);
      await waitForJob(fx.jobStore, fx.dispatcher.submit(ref).id);
    }

    expect(fx.pool.getWorkers()[0].processedJobs).toBe(2);
  });
});

describe('toJobError', () => {
  it('keeps the missing columns of a schema failure', () => {
    const err = new SchemaError(['company_name'], ['stock_symbol', 'company_name']);

    expect(toJobError(err)).toEqual({
      type: 'SchemaError',
      message: err.message,
      missingColumns: ['company_name'],
    });
  });

  it('classifies read failures', () => {
    expect(toJobError(new DatasetReadError('x.xlsx', 'corrupt'))).toEqual({
      type: 'DatasetReadError',
      message: 'Could not read dataset "x.xlsx": corrupt',
    });
  });

  it('reports anything else as a pipeline error', () => {
    expect(toJobError(new Error('disk full'))).toEqual({
      type: 'PipelineError',
      message: 'disk full',
    });
  });
});
