import {
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
} from 'class-validator';
import { MaxCodePoints } from './max-code-points.decorator';

export const E164_PATTERN = /^\+\d+$/;
export const UTC_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;
export const MAX_TEXT_LENGTH = 4096;

/**
 * Wire shape of an inbound message webhook.
 * Unknown fields are ignored.
 */
export class InboundMessagePayload {
  @IsString()
  @IsNotEmpty()
  message_id!: string;

  @IsString()
  @Matches(E164_PATTERN, {
    message: '$property must be + followed by digits',
  })
  from!: string;

  @IsString()
  @Matches(E164_PATTERN, {
    message: '$property must be + followed by digits',
  })
  to!: string;

  @IsString()
  @Matches(UTC_TIMESTAMP_PATTERN, {
    message: '$property must be an ISO-8601 UTC timestamp ending in Z',
  })
  @IsISO8601(
    { strict: true },
    { message: '$property must be a valid calendar instant' },
  )
  ts!: string;

  @IsOptional()
  @IsString()
  @MaxCodePoints(MAX_TEXT_LENGTH)
  text?: string | null;
}
