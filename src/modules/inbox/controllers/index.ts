/**
 * Inbox Controllers
 * Clean controllers using shared Swagger decorators and DTOs
 */

export { WebhookController } from './webhook.controller';
export { MessagesController } from './messages.controller';
export { StatsController } from './stats.controller';
export { HealthController } from './health.controller';
export { MetricsController } from './metrics.controller';
