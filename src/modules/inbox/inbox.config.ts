import { DataSourceOptions } from 'typeorm';
import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import { MessageStore, LifecycleHooks } from '../../core';
import type { MockStorageOptions } from '../../adapters/storage/mock';

/**
 * Inbox Module Configuration
 */
export interface InboxModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    /**
     * TypeORM data source options (type: 'typeorm')
     */
    options?: DataSourceOptions;
    /**
     * In-memory store behaviour (type: 'mock')
     */
    mock?: MockStorageOptions;
    /**
     * Ready-made store (type: 'custom')
     */
    adapter?: MessageStore;
  };

  /**
   * Webhook verification settings
   */
  webhook: {
    /**
     * Shared HMAC secret. An empty secret rejects every delivery
     * and keeps the service not-ready.
     */
    secret: string;
    /**
     * Header carrying the hex signature
     * Default: x-signature
     */
    signatureHeader?: string;
  };

  /**
   * Read query settings
   */
  queries?: {
    timeoutMs?: number;
  };

  /**
   * Built-in outcome handlers
   */
  events?: {
    enableLogging?: boolean;
    enableMetrics?: boolean;
  };

  /**
   * Lifecycle hooks, called after the built-in handlers
   */
  hooks?: LifecycleHooks;
}

/**
 * Async configuration factory
 */
export interface InboxModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<InboxModuleConfig>['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultInboxConfig = {
  signatureHeader: 'x-signature',
  queryTimeoutMs: 5000,
  enableLogging: true,
  enableMetrics: true,
} as const;
