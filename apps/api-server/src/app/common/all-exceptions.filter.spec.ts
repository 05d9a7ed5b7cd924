import { BadRequestException, NotFoundException } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { AllExceptionsFilter } from './all-exceptions.filter';

describe('AllExceptionsFilter', () => {
  const adapterHost = new HttpAdapterHost();

  afterEach(() => jest.restoreAllMocks());

  it('keeps the status and message of HTTP exceptions', () => {
    const filter = new AllExceptionsFilter(adapterHost, false);

    expect(filter.toResponse(new NotFoundException('Job JOB-1 not found'))).toEqual([
      404,
      { success: false, error: 'Job JOB-1 not found' },
    ]);
  });

  it('joins a list of validation messages', () => {
    const filter = new AllExceptionsFilter(adapterHost, false);

    expect(filter.toResponse(new BadRequestException(['a is required', 'b is required']))).toEqual([
      400,
      { success: false, error: 'a is required; b is required' },
    ]);
  });

  it('keeps the client status of body parsing errors', () => {
    const filter = new AllExceptionsFilter(adapterHost, false);
    const tooLarge = Object.assign(new Error('request entity too large'), {
      status: 413,
      type: 'entity.too.large',
    });

    expect(filter.toResponse(tooLarge)).toEqual([
      413,
      { success: false, error: 'request entity too large' },
    ]);
  });

  it('treats a server status on an error as internal', () => {
    const filter = new AllExceptionsFilter(adapterHost, false);
    const failure = Object.assign(new Error('stream broke'), { status: 503 });

    expect(filter.toResponse(failure)).toEqual([
      500,
      { success: false, error: 'Internal server error' },
    ]);
  });

  it('hides internals of unexpected errors', () => {
    const filter = new AllExceptionsFilter(adapterHost, false);

    expect(filter.toResponse(new Error('SQLITE_CORRUPT'))).toEqual([
      500,
      { success: false, error: 'Internal server error' },
    ]);
  });

  it('adds details in debug mode', () => {
    const filter = new AllExceptionsFilter(adapterHost, true);

    expect(filter.toResponse(new Error('SQLITE_CORRUPT'))).toEqual([
      500,
      { success: false, error: 'Internal server error', details: 'SQLITE_CORRUPT' },
    ]);
  });
});
