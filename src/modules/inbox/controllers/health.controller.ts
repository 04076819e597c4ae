import {
  Controller,
  Get,
  Inject,
  HttpStatus,
  HttpCode,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { MessageQueryService } from '../../../core';
import { MESSAGE_QUERY_SERVICE } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import {
  ApiLivenessCheck,
  ApiReadinessCheck,
} from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 * Liveness never touches dependencies; readiness checks the secret and the database
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(MESSAGE_QUERY_SERVICE)
    private readonly queryService: MessageQueryService,
    private readonly configurationService: ConfigurationService,
  ) {}

  @Get('live')
  @HttpCode(HttpStatus.OK)
  @ApiLivenessCheck()
  live(): { status: string } {
    return { status: 'ok' };
  }

  @Get('ready')
  @HttpCode(HttpStatus.OK)
  @ApiReadinessCheck()
  async ready(): Promise<{ status: string }> {
    if (!this.configurationService.isSecretConfigured()) {
      throw new ServiceUnavailableException({
        status: 'not ready',
        reason: 'WEBHOOK_SECRET not set',
      });
    }

    if (!(await this.queryService.isReady())) {
      throw new ServiceUnavailableException({
        status: 'not ready',
        reason: 'database not ready',
      });
    }

    return { status: 'ready' };
  }
}
