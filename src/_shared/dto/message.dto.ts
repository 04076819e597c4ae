import {
  IsInt,
  IsISO8601,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

/**
 * DTO for listing messages
 */
export class ListMessagesQueryDto {
  @ApiPropertyOptional({
    description: 'Page size',
    default: 50,
    minimum: 1,
    maximum: 100,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit?: number;

  @ApiPropertyOptional({
    description: 'Number of matching messages to skip',
    default: 0,
    minimum: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset?: number;

  @ApiPropertyOptional({
    description: 'Exact sender match',
    example: '+919876543210',
  })
  @IsOptional()
  @IsString()
  from?: string;

  @ApiPropertyOptional({
    description: 'Only messages at or after this instant (ISO-8601)',
    example: '2025-01-15T09:00:00Z',
  })
  @IsOptional()
  @IsISO8601({ strict: true })
  since?: string;

  @ApiPropertyOptional({
    description: 'Case-insensitive substring of the message text',
    example: 'hello',
  })
  @IsOptional()
  @IsString()
  q?: string;
}

/**
 * Message as returned by the API
 */
export class MessageResponseDto {
  @ApiProperty({ example: 'm1' })
  message_id!: string;

  @ApiProperty({ example: '+919876543210' })
  from!: string;

  @ApiProperty({ example: '+14155550100' })
  to!: string;

  @ApiProperty({ example: '2025-01-15T10:00:00Z' })
  ts!: string;

  @ApiProperty({ example: 'Hello', nullable: true, type: String })
  text!: string | null;
}

export class MessageListResponseDto {
  @ApiProperty({ type: [MessageResponseDto] })
  data!: MessageResponseDto[];

  @ApiProperty({ description: 'Matches ignoring limit/offset', example: 1 })
  total!: number;

  @ApiProperty({ example: 50 })
  limit!: number;

  @ApiProperty({ example: 0 })
  offset!: number;
}

export class SenderCountDto {
  @ApiProperty({ example: '+919876543210' })
  from!: string;

  @ApiProperty({ example: 3 })
  count!: number;
}

export class StatsResponseDto {
  @ApiProperty({ example: 4 })
  total_messages!: number;

  @ApiProperty({ example: 2 })
  senders_count!: number;

  @ApiProperty({
    type: [SenderCountDto],
    description: 'Top 10 senders by message count',
  })
  messages_per_sender!: SenderCountDto[];

  @ApiProperty({ nullable: true, type: String, example: '2025-01-15T09:00:00Z' })
  first_message_ts!: string | null;

  @ApiProperty({ nullable: true, type: String, example: '2025-01-15T12:00:00Z' })
  last_message_ts!: string | null;
}
