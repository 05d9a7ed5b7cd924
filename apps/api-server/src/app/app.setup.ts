import { HttpAdapterHost } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import compression from 'compression';
import { AllExceptionsFilter } from './common/all-exceptions.filter';
import { AppConfig } from './config/app-config';

/** Responses smaller than this are sent uncompressed */
export const COMPRESSION_THRESHOLD_BYTES = 1000;

/** Room for the JSON envelope around the base64 upload */
const JSON_ENVELOPE_BYTES = 64 * 1024;

/**
 * JSON body limit that fits the largest accepted upload once base64 encoded.
 */
export function jsonBodyLimit(config: AppConfig): number {
  return Math.ceil((config.staging.maxUploadBytes * 4) / 3) + JSON_ENVELOPE_BYTES;
}

/**
 * HTTP concerns shared by the server bootstrap and the HTTP-level specs.
 * The app must be created with `bodyParser: false`.
 */
export function configureApp(app: NestExpressApplication, config: AppConfig): void {
  app.setGlobalPrefix(config.apiPrefix);
  app.enableCors({ origin: config.corsOrigin, credentials: true });
  app.use(compression({ threshold: COMPRESSION_THRESHOLD_BYTES }));
  app.useBodyParser('json', { limit: jsonBodyLimit(config) });
  app.useGlobalFilters(new AllExceptionsFilter(app.get(HttpAdapterHost), config.debug));
}
