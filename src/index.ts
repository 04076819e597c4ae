/**
 * Webhook Inbox
 *
 * Ingests signed inbound message webhooks, stores each message once,
 * and serves listing and statistics over the stored messages.
 */

// Export all core components
export * from './core';

// Export wire DTOs
export * from './_shared/dto';

// Export testing utilities from _shared
export { SignedEventFactory } from './_shared/testing/signed-event.factory';
export type {
  InboundMessageFields,
  SignedEvent,
  SignedEventOptions,
} from './_shared/testing/signed-event.factory';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';

// Export NestJS module, controllers, tokens and configuration types
export * from './modules';

// Export the HTTP application factory
export { createApplication } from './app.factory';

// Export environment configuration
export * from './config';
