import { Logger } from '@nestjs/common';
import { IngestionResult } from '../../domain/enums';
import { IngestionEvent } from '../../interfaces';

/**
 * Logging event handler
 * One structured line per ingestion outcome
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Pick<Logger, 'log' | 'warn'> = new Logger(
      'Ingestion',
    ),
  ) {}

  /**
   * Create the outcome handler function
   */
  getHandler(): (event: IngestionEvent) => void {
    return (event) => {
      const entry = {
        message: 'ingestion outcome',
        processing_id: event.processingId,
        message_id: event.messageId ?? null,
        dup: event.result === IngestionResult.DUPLICATE,
        result: event.result,
        duration_ms: event.durationMs,
        ...(event.errorCount !== undefined && {
          error_count: event.errorCount,
        }),
      };

      if (
        event.result === IngestionResult.INVALID_SIGNATURE ||
        event.result === IngestionResult.VALIDATION_ERROR
      ) {
        this.logger.warn(entry);
      } else {
        this.logger.log(entry);
      }
    };
  }
}
