import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import type { InboxRequest } from '../types/inbox-request';

/**
 * Raw Body Interceptor
 *
 * Guarantees `request.rawBody` holds the bytes received on the wire.
 * A body that was already parsed is never re-serialised: signatures are
 * computed over the original bytes, so it is treated as empty instead.
 */
@Injectable()
export class RawBodyInterceptor implements NestInterceptor {
  private readonly logger = new Logger(RawBodyInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<InboxRequest>();

    if (!request.rawBody) {
      request.rawBody = this.captureRawBody(request);
    }

    return next.handle();
  }

  private captureRawBody(request: InboxRequest): Buffer {
    if (Buffer.isBuffer(request.body)) {
      return request.body;
    }
    if (typeof request.body === 'string') {
      return Buffer.from(request.body, 'utf8');
    }
    if (request.body !== undefined) {
      this.logger.warn(
        'Raw body unavailable for a parsed request; enable rawBody on the application',
      );
    }
    return Buffer.alloc(0);
  }
}
