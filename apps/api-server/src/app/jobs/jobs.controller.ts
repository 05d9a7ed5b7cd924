import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  Query,
  ServiceUnavailableException,
} from '@nestjs/common';
import { z } from 'zod';
import { BulkPredictionRequest, JobStatus, JobStatusView } from '@riskline/shared-models';
import { UploadStagingService } from '../ingestion/upload-staging.service';
import { JobDispatcherService } from './job-dispatcher.service';
import { DispatchError } from './jobs.errors';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const bulkPredictionBody: z.ZodType<BulkPredictionRequest> = z.object({
  fileName: z.string().trim().min(1, 'fileName is required'),
  contentBase64: z
    .string()
    .min(1, 'contentBase64 is required')
    .transform((value) => value.replace(/\s+/g, ''))
    .refine((value) => BASE64.test(value), 'contentBase64 is not valid base64'),
});

export interface BulkPredictionAccepted {
  jobId: string;
  status: JobStatus;
  submittedAt: string;
}

@Controller('jobs')
export class JobsController {
  private readonly logger = new Logger(JobsController.name);

  constructor(
    private readonly dispatcher: JobDispatcherService,
    private readonly staging: UploadStagingService
  ) {}

  /**
   * POST /api/jobs/bulk-predictions
   *
   * Stages the uploaded spreadsheet and queues it for background processing.
   * Responds as soon as the job is queued; poll GET /api/jobs/:id for the outcome.
   */
  @Post('bulk-predictions')
  @HttpCode(HttpStatus.ACCEPTED)
  submitBulkPredictions(@Body() body: unknown): BulkPredictionAccepted {
    const parsed = bulkPredictionBody.safeParse(body ?? {});
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.issues.map((i) => i.message).join('; '));
    }

    const { fileName, contentBase64 } = parsed.data;
    const content = Buffer.from(contentBase64, 'base64');

    const rejection = this.staging.checkUpload(fileName, content.length);
    if (rejection) {
      this.logger.warn(`Upload rejected: ${rejection}`);
      throw new BadRequestException(rejection);
    }

    const datasetRef = this.staging.stage(fileName, content);

    try {
      const handle = this.dispatcher.submit(datasetRef);
      return { jobId: handle.id, status: handle.status, submittedAt: handle.submittedAt };
    } catch (err) {
      this.staging.remove(datasetRef);
      if (err instanceof DispatchError) {
        throw new ServiceUnavailableException(err.message);
      }
      throw err;
    }
  }

  /**
   * GET /api/jobs?limit=20
   */
  @Get()
  listJobs(@Query('limit') limit?: string): JobStatusView[] {
    const parsed = limit === undefined ? undefined : Number.parseInt(limit, 10);
    if (parsed !== undefined && (!Number.isFinite(parsed) || parsed < 1)) {
      throw new BadRequestException('limit must be a positive integer');
    }
    return this.dispatcher.list(parsed);
  }

  /**
   * GET /api/jobs/:id
   */
  @Get(':id')
  getJob(@Param('id') id: string): JobStatusView {
    const job = this.dispatcher.status(id);
    if (!job) {
      throw new NotFoundException(`Job ${id} not found`);
    }
    return job;
  }
}
