import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for liveness
 */
export const ApiLivenessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Liveness probe',
      description: 'Returns ok while the process is running',
    }),
    ApiResponse({
      status: 200,
      description: 'Process is alive',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'ok' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness probe',
      description:
        'Ready when the webhook secret is configured and the database answers',
    }),
    ApiResponse({
      status: 200,
      description: 'Ready to accept traffic',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'ready' },
        },
      },
    }),
    ApiResponse({
      status: 503,
      description: 'Not ready',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'not ready' },
          reason: {
            type: 'string',
            enum: ['WEBHOOK_SECRET not set', 'database not ready'],
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for the Prometheus endpoint
 */
export const ApiMetricsEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Prometheus metrics',
      description:
        'http_requests_total, webhook_requests_total and request_latency_ms in text exposition format',
    }),
    ApiProduces('text/plain'),
    ApiResponse({ status: 200, description: 'Metrics text' }),
  );
};
