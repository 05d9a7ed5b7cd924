import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { describeError } from './errors';

export interface ErrorResponse {
  success: false;
  error: string;
  details?: string;
}

/**
 * Last-resort handler for HTTP requests: every failure becomes an
 * {@link ErrorResponse}. Internals are only exposed in debug mode.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(
    private readonly adapterHost: HttpAdapterHost,
    private readonly debug: boolean
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const ctx = host.switchToHttp();

    const [status, body] = this.toResponse(exception);
    httpAdapter.reply(ctx.getResponse(), body, status);
  }

  toResponse(exception: unknown): [number, ErrorResponse] {
    if (exception instanceof HttpException) {
      return [exception.getStatus(), { success: false, error: httpMessage(exception) }];
    }

    const clientStatus = clientErrorStatus(exception);
    if (exception instanceof Error && clientStatus !== undefined) {
      this.logger.warn(`Request rejected (${clientStatus}): ${exception.message}`);
      return [clientStatus, { success: false, error: exception.message }];
    }

    this.logger.error(
      `Unhandled error: ${describeError(exception)}`,
      exception instanceof Error ? exception.stack : undefined
    );

    const body: ErrorResponse = { success: false, error: 'Internal server error' };
    if (this.debug) {
      body.details = describeError(exception);
    }
    return [HttpStatus.INTERNAL_SERVER_ERROR, body];
  }
}

/**
 * 4xx status carried by middleware errors such as an oversized or malformed
 * body (the `status` field set by body-parser).
 */
function clientErrorStatus(exception: unknown): number | undefined {
  if (typeof exception !== 'object' || exception === null || !('status' in exception)) {
    return undefined;
  }
  const { status } = exception;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

/** Message of an HttpException, joining validation messages if there are several */
function httpMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return response;
  }
  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (Array.isArray(message)) return message.join('; ');
    if (typeof message === 'string') return message;
  }
  return exception.message;
}
