/**
 * Centralized Swagger decorators for the Inbox API
 *
 * These decorators provide consistent API documentation across all controllers
 * while keeping the controllers clean and focused on business logic.
 */

export * from './webhook.decorators';
export * from './message.decorators';
export * from './health.decorators';
