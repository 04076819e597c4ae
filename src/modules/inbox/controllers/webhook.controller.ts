import {
  Controller,
  Post,
  Headers,
  HttpCode,
  HttpStatus,
  UseInterceptors,
  Inject,
  UnauthorizedException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import {
  ClientAbortSignal,
  RawBody,
  RequestId,
} from '../decorators/webhook.decorators';
import { ConfigurationService } from '../services/configuration.service';
import {
  IngestionPipeline,
  IngestionResult,
  FieldError,
} from '../../../core';
import { ApiWebhookEndpoint, FieldErrorDto } from '../../../_shared';
import { WebhookResponseDto } from '../../../_shared';
import { INGESTION_PIPELINE } from '../constants';

/**
 * Webhook Controller
 *
 * Entry point for signed inbound message deliveries.
 */
@ApiTags('Ingest')
@Controller('webhook')
export class WebhookController {
  constructor(
    @Inject(INGESTION_PIPELINE)
    private readonly pipeline: IngestionPipeline,
    private readonly configurationService: ConfigurationService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(RawBodyInterceptor)
  @ApiWebhookEndpoint()
  async receive(
    @RawBody() rawBody: Buffer,
    @Headers() headers: Record<string, string | string[] | undefined>,
    @RequestId() requestId?: string,
    @ClientAbortSignal() signal?: AbortSignal,
  ): Promise<WebhookResponseDto> {
    const signature = headers[this.configurationService.getSignatureHeader()];

    const outcome = await this.pipeline.handle(
      rawBody,
      typeof signature === 'string' ? signature : undefined,
      this.configurationService.getWebhookSecret(),
      { processingId: requestId, signal },
    );

    switch (outcome.result) {
      case IngestionResult.CREATED:
      case IngestionResult.DUPLICATE:
        return { status: 'ok' };

      case IngestionResult.INVALID_SIGNATURE:
        throw new UnauthorizedException({ detail: 'invalid signature' });

      case IngestionResult.VALIDATION_ERROR:
        throw new UnprocessableEntityException({
          detail: outcome.errors.map((error) => this.toFieldErrorDto(error)),
        });
    }
  }

  private toFieldErrorDto(error: FieldError): FieldErrorDto {
    return {
      loc: error.location === 'body' ? ['body'] : ['body', error.location],
      msg: error.message,
    };
  }
}
