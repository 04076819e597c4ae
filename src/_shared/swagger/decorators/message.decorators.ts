import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  MessageListResponseDto,
  StatsResponseDto,
  ValidationErrorResponseDto,
} from '../../dto';

/**
 * Swagger decorator for message listing
 */
export const ApiListMessages = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List messages',
      description:
        'Messages ordered by ts then message_id. Filters combine with AND; total ignores limit and offset.',
    }),
    ApiResponse({
      status: 200,
      description: 'Page of messages',
      type: MessageListResponseDto,
    }),
    ApiResponse({
      status: 422,
      description: 'Invalid query parameters',
      type: ValidationErrorResponseDto,
    }),
  );
};

/**
 * Swagger decorator for message statistics
 */
export const ApiMessageStats = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Message statistics',
      description:
        'Totals, distinct senders, top 10 senders and the earliest and latest message timestamps.',
    }),
    ApiResponse({
      status: 200,
      description: 'Statistics snapshot',
      type: StatsResponseDto,
    }),
  );
};
