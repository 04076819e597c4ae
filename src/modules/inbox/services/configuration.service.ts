import { Injectable, Inject } from '@nestjs/common';
import type { InboxModuleConfig } from '../inbox.config';
import { defaultInboxConfig } from '../inbox.config';
import { INBOX_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Provides access to Inbox configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(INBOX_CONFIG)
    private readonly config: InboxModuleConfig,
  ) {}

  getWebhookSecret(): string {
    return this.config.webhook.secret;
  }

  /**
   * Readiness depends on this; the store does not know the secret
   */
  isSecretConfigured(): boolean {
    return this.config.webhook.secret.length > 0;
  }

  /**
   * Lowercased, as Node exposes incoming header names
   */
  getSignatureHeader(): string {
    return (
      this.config.webhook.signatureHeader ?? defaultInboxConfig.signatureHeader
    ).toLowerCase();
  }

  getQueryTimeoutMs(): number {
    return this.config.queries?.timeoutMs ?? defaultInboxConfig.queryTimeoutMs;
  }

  isLoggingEnabled(): boolean {
    return this.config.events?.enableLogging ?? defaultInboxConfig.enableLogging;
  }

  isMetricsEnabled(): boolean {
    return this.config.events?.enableMetrics ?? defaultInboxConfig.enableMetrics;
  }
}
