import { NestExpressApplication } from '@nestjs/platform-express';
import { Test } from '@nestjs/testing';
import { z } from 'zod';
import { createTestWorkspace, TestWorkspace } from '../testing/test-config';
import { waitForJob } from '../testing/job-helpers';
import { AppModule } from './app.module';
import { configureApp, jsonBodyLimit } from './app.setup';
import { APP_CONFIG } from './config/app-config';
import { JobStoreService } from './jobs/job-store.service';

const MAX_UPLOAD_BYTES = 300000;

const acceptedBody = z.object({ jobId: z.string(), status: z.string() });

/** A csv upload whose size is driven by the padding in the sector column */
function csvUpload(rows: number, padding: number): Buffer {
  const lines = ['stock_symbol,company_name,sector,current_ratio'];
  for (let i = 0; i < rows; i++) {
    lines.push(`S${i},Company ${i},${'x'.repeat(padding)},1.5`);
  }
  return Buffer.from(`${lines.join('\n')}\n`);
}

describe('HTTP API', () => {
  let workspace: TestWorkspace;
  let app: NestExpressApplication;
  let baseUrl: string;

  const post = (path: string, body: string) =>
    fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body,
    });

  const submit = (fileName: string, content: Buffer) =>
    post(
      '/api/jobs/bulk-predictions',
      JSON.stringify({ fileName, contentBase64: content.toString('base64') })
    );

  beforeAll(async () => {
    workspace = createTestWorkspace({ MAX_UPLOAD_BYTES: String(MAX_UPLOAD_BYTES) });
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(APP_CONFIG)
      .useValue(workspace.config)
      .compile();

    app = moduleRef.createNestApplication<NestExpressApplication>({
      bodyParser: false,
      logger: false,
    });
    configureApp(app, workspace.config);
    await app.listen(0, '127.0.0.1');
    baseUrl = await app.getUrl();
  });

  afterAll(async () => {
    const store = app.get(JobStoreService);
    await Promise.all(store.list(100).map((job) => waitForJob(store, job.id, 20000)));
    await app.close();
    workspace.cleanup();
  }, 30000);

  describe('POST /api/jobs/bulk-predictions', () => {
    it('accepts an upload larger than the default JSON body limit', async () => {
      const content = csvUpload(150, 1000);
      expect(content.toString('base64').length).toBeGreaterThan(100 * 1024);

      const res = await submit('large.csv', content);
      const accepted = acceptedBody.parse(await res.json());

      expect(res.status).toBe(202);
      expect(accepted.status).toBe('pending');

      const job = await waitForJob(app.get(JobStoreService), accepted.jobId, 20000);
      expect(job.status).toBe('succeeded');
      expect(job.result).toEqual({ processed: 150, succeeded: 150, failed: 0, errors: [] });
    }, 30000);

    it('answers 400 for a file over the upload limit that fits the body limit', async () => {
      const content = csvUpload(300, 1000);
      expect(content.length).toBeGreaterThan(MAX_UPLOAD_BYTES);
      expect(content.toString('base64').length).toBeLessThan(jsonBodyLimit(workspace.config));

      const res = await submit('too-big.csv', content);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        success: false,
        error: `File "too-big.csv" is ${content.length} bytes; the limit is ${MAX_UPLOAD_BYTES} bytes.`,
      });
    });

    it('answers 413 for a body over the JSON limit', async () => {
      const body = JSON.stringify({
        fileName: 'huge.csv',
        contentBase64: 'A'.repeat(jsonBodyLimit(workspace.config) + 1),
      });

      const res = await post('/api/jobs/bulk-predictions', body);

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({ success: false, error: 'request entity too large' });
    });

    it('answers 400 for malformed JSON', async () => {
      const res = await post('/api/jobs/bulk-predictions', '{"fileName":');

      expect(res.status).toBe(400);
    });
  });

  describe('response compression', () => {
    it('leaves small responses uncompressed', async () => {
      const res = await fetch(`${baseUrl}/api`, { headers: { 'accept-encoding': 'gzip' } });

      expect(res.status).toBe(200);
      expect(res.headers.get('content-encoding')).toBeNull();
      expect(await res.json()).toMatchObject({ name: 'riskline' });
    });

    it('gzips responses over the threshold', async () => {
      for (let i = 0; i < 10; i++) {
        const res = await submit(`batch-${i}.csv`, csvUpload(1, 0));
        expect(res.status).toBe(202);
      }

      const res = await fetch(`${baseUrl}/api/jobs`, { headers: { 'accept-encoding': 'gzip' } });
      const jobs = z.array(z.object({ id: z.string() })).parse(await res.json());

      expect(res.headers.get('content-encoding')).toBe('gzip');
      expect(jobs.length).toBeGreaterThanOrEqual(10);
    });
  });
});
