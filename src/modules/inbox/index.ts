/**
 * Inbox NestJS Module
 *
 * Main module for integrating message ingestion into NestJS applications
 */

// Main module
export { InboxModule } from './inbox.module';

// Configuration
export { defaultInboxConfig } from './inbox.config';
export type { InboxModuleConfig, InboxModuleAsyncConfig } from './inbox.config';

// Controllers
export * from './controllers';
export {
  listQueryValidationPipe,
  toMessageResponse,
} from './controllers/messages.controller';

// Services
export { ConfigurationService } from './services/configuration.service';

// Decorators
export * from './decorators/webhook.decorators';

// Interceptors and filters
export { RawBodyInterceptor } from './interceptors/raw-body.interceptor';
export {
  RequestLoggingInterceptor,
  REQUEST_ID_HEADER,
} from './interceptors/request-logging.interceptor';
export { InboxExceptionFilter } from './filters/inbox-exception.filter';

// Injection tokens
export * from './constants';

export type { InboxRequest } from './types/inbox-request';
