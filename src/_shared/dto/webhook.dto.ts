import { ApiProperty } from '@nestjs/swagger';

/**
 * Response DTO for an accepted webhook (created or duplicate)
 */
export class WebhookResponseDto {
  @ApiProperty({
    description: 'Always "ok"; duplicates are acknowledged the same way',
    example: 'ok',
  })
  status!: 'ok';
}

/**
 * Single field violation in a 422 response
 */
export class FieldErrorDto {
  @ApiProperty({
    description: 'Location of the offending value',
    example: ['body', 'from'],
    type: [String],
  })
  loc!: string[];

  @ApiProperty({
    description: 'What was wrong with it',
    example: 'from must be + followed by digits',
  })
  msg!: string;
}

export class ValidationErrorResponseDto {
  @ApiProperty({ type: [FieldErrorDto] })
  detail!: FieldErrorDto[];
}
