/**
 * Inbox Core - ingestion and query logic
 * Independent of HTTP and of the database in use
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';

// Interfaces and contracts
export * from './interfaces';

// Verification and validation
export * from './verification';
export * from './validation';

// Webhook ingestion pipeline
export * from './pipeline';

// Core services
export * from './services';
export * from './utils';

// Outcome handlers
export * from './events';
