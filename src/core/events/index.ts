/**
 * Built-in ingestion outcome handlers
 */
export { LoggingEventHandler } from './handlers/logging.handler';
export { MetricsEventHandler } from './handlers/metrics.handler';
