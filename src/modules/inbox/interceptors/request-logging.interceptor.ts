import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Inject,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { Observable } from 'rxjs';
import { v4 as uuidv4 } from 'uuid';
import { MetricsEventHandler } from '../../../core';
import { INGESTION_METRICS } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import type { InboxRequest } from '../types/inbox-request';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Request Logging Interceptor
 *
 * Tags each HTTP request with a request id and, once the response is
 * written, logs it and records the HTTP metrics. Listening for 'finish'
 * captures statuses set later by exception filters.
 */
@Injectable()
export class RequestLoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  constructor(
    @Inject(INGESTION_METRICS)
    private readonly metrics: MetricsEventHandler,
    private readonly configurationService: ConfigurationService,
  ) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const http = context.switchToHttp();
    const request = http.getRequest<InboxRequest>();
    const response = http.getResponse<Response>();

    const requestId = uuidv4();
    const startTime = process.hrtime.bigint();

    request.requestId = requestId;
    response.setHeader(REQUEST_ID_HEADER, requestId);

    response.once('finish', () => {
      const latencyMs =
        Number(process.hrtime.bigint() - startTime) / 1_000_000;

      this.logger.log({
        message: 'request',
        request_id: requestId,
        method: request.method,
        path: request.path,
        status: response.statusCode,
        latency_ms: Math.round(latencyMs * 100) / 100,
      });

      if (this.configurationService.isMetricsEnabled()) {
        this.metrics.recordHttpRequest(
          request.path,
          response.statusCode,
          latencyMs,
        );
      }
    });

    return next.handle();
  }
}
