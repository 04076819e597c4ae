/**
 * Centralized DTOs for the Inbox API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './message.dto';
export * from './webhook.dto';
