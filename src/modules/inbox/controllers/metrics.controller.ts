import { Controller, Get, Header, Inject } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Registry } from 'prom-client';
import { MetricsEventHandler } from '../../../core';
import { ApiMetricsEndpoint } from '../../../_shared';
import { INGESTION_METRICS } from '../constants';

@ApiTags('Health')
@Controller('metrics')
export class MetricsController {
  constructor(
    @Inject(INGESTION_METRICS)
    private readonly metrics: MetricsEventHandler,
  ) {}

  @Get()
  @Header('Content-Type', Registry.PROMETHEUS_CONTENT_TYPE)
  @ApiMetricsEndpoint()
  async metricsText(): Promise<string> {
    return this.metrics.render();
  }
}
