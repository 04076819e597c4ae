import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  IngestionAbortedError,
  InvalidQueryError,
  PipelineError,
  QueryTimeoutError,
  StorageUnavailableError,
} from '../../../core';

type InboxError =
  | PipelineError
  | QueryTimeoutError
  | InvalidQueryError
  | IngestionAbortedError
  | StorageUnavailableError;

/**
 * Maps core errors to HTTP responses
 */
@Catch(
  PipelineError,
  QueryTimeoutError,
  InvalidQueryError,
  IngestionAbortedError,
  StorageUnavailableError,
)
export class InboxExceptionFilter implements ExceptionFilter<InboxError> {
  private readonly logger = new Logger(InboxExceptionFilter.name);

  catch(exception: InboxError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const { status, detail } = this.describe(exception);

    if (status >= 500) {
      this.logger.error(`${exception.name}: ${exception.message}`);
    }

    response.status(status).json({ detail });
  }

  describe(exception: InboxError): { status: number; detail: unknown } {
    if (exception instanceof InvalidQueryError) {
      return {
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        detail: [{ loc: ['query', exception.field], msg: exception.message }],
      };
    }
    if (exception instanceof QueryTimeoutError) {
      return {
        status: HttpStatus.SERVICE_UNAVAILABLE,
        detail: 'query timed out',
      };
    }
    if (exception instanceof IngestionAbortedError) {
      return {
        status: HttpStatus.SERVICE_UNAVAILABLE,
        detail: 'request aborted',
      };
    }
    return {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      detail: 'storage unavailable',
    };
  }
}
