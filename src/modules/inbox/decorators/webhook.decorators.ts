import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { IncomingMessage, ServerResponse } from 'http';
import type { InboxRequest } from '../types/inbox-request';

/**
 * Exact request bytes, as captured by RawBodyInterceptor
 */
export const RawBody = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Buffer => {
    const request = ctx.switchToHttp().getRequest<InboxRequest>();
    return request.rawBody ?? Buffer.alloc(0);
  },
);

/**
 * Request id assigned by RequestLoggingInterceptor
 */
export const RequestId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string | undefined => {
    return ctx.switchToHttp().getRequest<InboxRequest>().requestId;
  },
);

/**
 * Aborts once the client goes away before the response is written
 */
export function abortSignalFor(
  request: IncomingMessage,
  response: ServerResponse,
): AbortSignal {
  const controller = new AbortController();

  if (request.socket.destroyed) {
    controller.abort();
    return controller.signal;
  }

  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}

export const ClientAbortSignal = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AbortSignal => {
    const http = ctx.switchToHttp();
    return abortSignalFor(
      http.getRequest<IncomingMessage>(),
      http.getResponse<ServerResponse>(),
    );
  },
);
