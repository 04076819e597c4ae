import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiBody, ApiHeader } from '@nestjs/swagger';
import { ValidationErrorResponseDto, WebhookResponseDto } from '../../dto';

/**
 * Swagger decorator for the webhook endpoint
 */
export const ApiWebhookEndpoint = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive inbound message webhook',
      description:
        'Verifies the HMAC-SHA256 signature of the raw body, validates the payload and stores the message once per message_id. Repeated deliveries are acknowledged with 200 and not stored again.',
    }),
    ApiHeader({
      name: 'X-Signature',
      description: 'Lowercase hex HMAC-SHA256 of the raw request body',
      required: true,
      example: '5d41402abc4b2a76b9719d911017c592...',
    }),
    ApiBody({
      description: 'Inbound message',
      required: true,
      schema: {
        type: 'object',
        required: ['message_id', 'from', 'to', 'ts'],
        properties: {
          message_id: { type: 'string', minLength: 1 },
          from: { type: 'string', pattern: '^\\+\\d+$' },
          to: { type: 'string', pattern: '^\\+\\d+$' },
          ts: { type: 'string', format: 'date-time' },
          text: { type: 'string', maxLength: 4096, nullable: true },
        },
        example: {
          message_id: 'm1',
          from: '+919876543210',
          to: '+14155550100',
          ts: '2025-01-15T10:00:00Z',
          text: 'Hello',
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Message stored, or already stored',
      type: WebhookResponseDto,
    }),
    ApiResponse({
      status: 401,
      description: 'Missing or invalid signature',
      schema: {
        type: 'object',
        properties: {
          detail: { type: 'string', example: 'invalid signature' },
        },
      },
    }),
    ApiResponse({
      status: 422,
      description: 'Payload failed validation',
      type: ValidationErrorResponseDto,
    }),
    ApiResponse({
      status: 503,
      description: 'Storage unavailable',
    }),
  );
};
