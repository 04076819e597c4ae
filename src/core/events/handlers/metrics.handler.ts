import { Counter, Registry, Summary } from 'prom-client';
import { IngestionResult } from '../../domain/enums';
import { IngestionEvent } from '../../interfaces';

/**
 * Prometheus metrics for the ingestion service.
 * Owns its own registry so several instances never collide.
 */
export class MetricsEventHandler {
  readonly registry: Registry;
  private readonly httpRequests: Counter<'path' | 'status'>;
  private readonly webhookRequests: Counter<'result'>;
  private readonly requestLatency: Summary;

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    this.httpRequests = new Counter({
      name: 'http_requests_total',
      help: 'Total HTTP requests by path and status',
      labelNames: ['path', 'status'],
      registers: [this.registry],
    });

    this.webhookRequests = new Counter({
      name: 'webhook_requests_total',
      help: 'Webhook ingestions by outcome',
      labelNames: ['result'],
      registers: [this.registry],
    });

    this.requestLatency = new Summary({
      name: 'request_latency_ms',
      help: 'HTTP request latency in milliseconds',
      percentiles: [0.5, 0.9, 0.99],
      registers: [this.registry],
    });

    for (const result of Object.values(IngestionResult)) {
      this.webhookRequests.inc({ result }, 0);
    }
  }

  /**
   * Outcome hook for the ingestion pipeline
   */
  getHandler(): (event: IngestionEvent) => void {
    return (event) => {
      this.webhookRequests.inc({ result: event.result });
    };
  }

  recordHttpRequest(path: string, status: number, latencyMs: number): void {
    this.httpRequests.inc({ path, status: String(status) });
    this.requestLatency.observe(latencyMs);
  }

  /**
   * Current webhook counter values keyed by outcome
   */
  async getOutcomeCounts(): Promise<Record<IngestionResult, number>> {
    const counts: Record<IngestionResult, number> = {
      [IngestionResult.CREATED]: 0,
      [IngestionResult.DUPLICATE]: 0,
      [IngestionResult.INVALID_SIGNATURE]: 0,
      [IngestionResult.VALIDATION_ERROR]: 0,
    };

    const snapshot = await this.webhookRequests.get();
    for (const { labels, value } of snapshot.values) {
      const result = Object.values(IngestionResult).find(
        (candidate) => candidate === labels.result,
      );
      if (result) {
        counts[result] = value;
      }
    }

    return counts;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
