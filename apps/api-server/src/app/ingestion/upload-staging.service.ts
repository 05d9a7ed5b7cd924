import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { DatasetRef } from '@riskline/shared-models';
import { APP_CONFIG, AppConfig } from '../config/app-config';
import { SUPPORTED_EXTENSIONS } from './dataset-schema';

/**
 * Holds uploaded spreadsheets on disk between submission and processing.
 *
 * Staged files are named by a generated upload ID (keeping only the original
 * extension), so client-supplied names never reach the filesystem.
 */
@Injectable()
export class UploadStagingService implements OnModuleInit {
  private readonly logger = new Logger(UploadStagingService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  onModuleInit(): void {
    fs.mkdirSync(this.directory, { recursive: true });
  }

  get directory(): string {
    return path.resolve(this.config.staging.directory);
  }

  /**
   * Check an upload before staging it.
   * Returns a human-readable rejection, or null when acceptable.
   */
  checkUpload(fileName: string, sizeBytes: number): string | null {
    const ext = path.extname(fileName).toLowerCase();
    if (!SUPPORTED_EXTENSIONS.includes(ext)) {
      return `Unsupported file type "${ext || fileName}". Accepted types are: ${SUPPORTED_EXTENSIONS.join(', ')}.`;
    }
    if (sizeBytes === 0) {
      return `File "${fileName}" is empty.`;
    }
    if (sizeBytes > this.config.staging.maxUploadBytes) {
      return `File "${fileName}" is ${sizeBytes} bytes; the limit is ${this.config.staging.maxUploadBytes} bytes.`;
    }
    return null;
  }

  stage(fileName: string, content: Buffer): DatasetRef {
    fs.mkdirSync(this.directory, { recursive: true });

    const ext = path.extname(fileName).toLowerCase();
    const stagedPath = path.join(this.directory, `${this.generateUploadId()}${ext}`);
    fs.writeFileSync(stagedPath, content);

    this.logger.log(`Staged "${fileName}" (${content.length} bytes) at ${stagedPath}`);
    return { path: stagedPath, fileName };
  }

  /**
   * Delete a staged artifact. Missing files are not an error.
   */
  remove(ref: DatasetRef): void {
    fs.rmSync(ref.path, { force: true });
    this.logger.debug(`Removed staged file ${ref.path}`);
  }

  private generateUploadId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `UPL-${timestamp}-${random}`;
  }
}
