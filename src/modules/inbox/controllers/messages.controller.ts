import {
  Controller,
  Get,
  Inject,
  Query,
  UnprocessableEntityException,
  ValidationPipe,
} from '@nestjs/common';
import type { ValidationError } from 'class-validator';
import { ApiTags } from '@nestjs/swagger';
import {
  Message,
  MessageQueryService,
  formatTimestamp,
} from '../../../core';
import {
  ApiListMessages,
  FieldErrorDto,
  ListMessagesQueryDto,
  MessageListResponseDto,
  MessageResponseDto,
} from '../../../_shared';
import { MESSAGE_QUERY_SERVICE } from '../constants';

const ZONE_DESIGNATOR = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/**
 * Query parameters are validated and coerced here; the service
 * re-checks ranges for callers that bypass HTTP. Failures use the same
 * `{detail: [{loc, msg}]}` body as the webhook endpoint.
 */
export const listQueryValidationPipe = new ValidationPipe({
  transform: true,
  exceptionFactory: (errors: ValidationError[]) =>
    new UnprocessableEntityException({
      detail: errors.flatMap((error) => toQueryFieldErrors(error)),
    }),
});

function toQueryFieldErrors(error: ValidationError): FieldErrorDto[] {
  return Object.values(error.constraints ?? {}).map((msg) => ({
    loc: ['query', error.property],
    msg,
  }));
}

@ApiTags('Query')
@Controller('messages')
export class MessagesController {
  constructor(
    @Inject(MESSAGE_QUERY_SERVICE)
    private readonly queryService: MessageQueryService,
  ) {}

  @Get()
  @ApiListMessages()
  async list(
    @Query(listQueryValidationPipe) query: ListMessagesQueryDto,
  ): Promise<MessageListResponseDto> {
    const page = await this.queryService.listMessages({
      limit: query.limit,
      offset: query.offset,
      from: query.from,
      since: query.since ? this.parseSince(query.since) : undefined,
      q: query.q,
    });

    return {
      data: page.items.map((message) => toMessageResponse(message)),
      total: page.total,
      limit: page.limit,
      offset: page.offset,
    };
  }

  /**
   * An instant without a zone is read as UTC, like stored timestamps
   */
  private parseSince(value: string): Date {
    const isDateTime = value.includes('T');
    return new Date(
      isDateTime && !ZONE_DESIGNATOR.test(value) ? `${value}Z` : value,
    );
  }
}

export function toMessageResponse(message: Message): MessageResponseDto {
  return {
    message_id: message.messageId,
    from: message.fromAddress,
    to: message.toAddress,
    ts: formatTimestamp(message.timestamp),
    text: message.text,
  };
}
