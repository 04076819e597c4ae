import { Controller, Get, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MessageQueryService, formatTimestamp } from '../../../core';
import { ApiMessageStats, StatsResponseDto } from '../../../_shared';
import { MESSAGE_QUERY_SERVICE } from '../constants';

@ApiTags('Query')
@Controller('stats')
export class StatsController {
  constructor(
    @Inject(MESSAGE_QUERY_SERVICE)
    private readonly queryService: MessageQueryService,
  ) {}

  @Get()
  @ApiMessageStats()
  async stats(): Promise<StatsResponseDto> {
    const stats = await this.queryService.getStats();

    return {
      total_messages: stats.total,
      senders_count: stats.distinctSenders,
      messages_per_sender: stats.topSenders.map(({ sender, count }) => ({
        from: sender,
        count,
      })),
      first_message_ts: stats.earliest ? formatTimestamp(stats.earliest) : null,
      last_message_ts: stats.latest ? formatTimestamp(stats.latest) : null,
    };
  }
}
