import type { RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';

/**
 * Express request as seen by Inbox handlers
 */
export type InboxRequest = RawBodyRequest<Request> & {
  requestId?: string;
};
