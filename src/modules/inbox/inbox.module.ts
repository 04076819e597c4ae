import {
  DynamicModule,
  Global,
  Inject,
  Module,
  OnApplicationShutdown,
  Provider,
  Type,
} from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { DataSource } from 'typeorm';
import { InboxModuleConfig, InboxModuleAsyncConfig } from './inbox.config';
import {
  MessageStore,
  IngestionEvent,
  IngestionPipeline,
  MessageQueryService,
  LoggingEventHandler,
  MetricsEventHandler,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import { TypeORMStorageAdapter } from '../../adapters/storage/typeorm';
import {
  WebhookController,
  MessagesController,
  StatsController,
  HealthController,
  MetricsController,
} from './controllers';
import { ConfigurationService } from './services/configuration.service';
import { RequestLoggingInterceptor } from './interceptors/request-logging.interceptor';
import { InboxExceptionFilter } from './filters/inbox-exception.filter';
import {
  INBOX_CONFIG,
  MESSAGE_STORE,
  INGESTION_PIPELINE,
  MESSAGE_QUERY_SERVICE,
  INGESTION_METRICS,
} from './constants';

const controllers: Type<unknown>[] = [
  WebhookController,
  MessagesController,
  StatsController,
  HealthController,
  MetricsController,
];

const exportedTokens = [
  INBOX_CONFIG,
  MESSAGE_STORE,
  INGESTION_PIPELINE,
  MESSAGE_QUERY_SERVICE,
  INGESTION_METRICS,
  ConfigurationService,
];

/**
 * Inbox Module - Main NestJS Module
 *
 * Provides dependency injection and configuration for webhook ingestion
 * and the message query API
 */
@Global()
@Module({})
export class InboxModule implements OnApplicationShutdown {
  constructor(
    @Inject(MESSAGE_STORE)
    private readonly store: MessageStore,
  ) {}

  /**
   * Configure Inbox synchronously
   */
  static forRoot(config: InboxModuleConfig): DynamicModule {
    return {
      module: InboxModule,
      providers: [
        {
          provide: INBOX_CONFIG,
          useValue: config,
        },
        ...this.createProviders(),
      ],
      controllers,
      exports: exportedTokens,
    };
  }

  /**
   * Configure Inbox asynchronously
   */
  static forRootAsync(options: InboxModuleAsyncConfig): DynamicModule {
    return {
      module: InboxModule,
      imports: options.imports || [],
      providers: [
        {
          provide: INBOX_CONFIG,
          useFactory: options.useFactory,
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers,
      exports: exportedTokens,
    };
  }

  async onApplicationShutdown(): Promise<void> {
    await this.store.close?.();
  }

  /**
   * Providers that depend on the resolved configuration
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: MESSAGE_STORE,
        useFactory: async (config: InboxModuleConfig): Promise<MessageStore> => {
          switch (config.storage.type) {
            case 'mock':
              return new MockStorageAdapter(config.storage.mock);

            case 'typeorm': {
              if (!config.storage.options) {
                throw new Error('TypeORM storage requires data source options');
              }
              const dataSource = new DataSource(config.storage.options);
              await dataSource.initialize();
              return new TypeORMStorageAdapter(dataSource);
            }

            case 'custom':
              if (!config.storage.adapter) {
                throw new Error('Custom storage adapter not provided');
              }
              return config.storage.adapter;
          }
        },
        inject: [INBOX_CONFIG],
      },
      {
        provide: ConfigurationService,
        useClass: ConfigurationService,
      },
      {
        provide: INGESTION_METRICS,
        useFactory: () => new MetricsEventHandler(),
      },
      {
        provide: INGESTION_PIPELINE,
        useFactory: (
          config: InboxModuleConfig,
          store: MessageStore,
          metrics: MetricsEventHandler,
          configurationService: ConfigurationService,
        ) => {
          const handlers: Array<(event: IngestionEvent) => void> = [];
          if (configurationService.isLoggingEnabled()) {
            handlers.push(new LoggingEventHandler().getHandler());
          }
          if (configurationService.isMetricsEnabled()) {
            handlers.push(metrics.getHandler());
          }

          return new IngestionPipeline({
            store,
            hooks: {
              onOutcome: async (event) => {
                for (const handler of handlers) {
                  handler(event);
                }
                await config.hooks?.onOutcome?.(event);
              },
              onError: config.hooks?.onError,
            },
          });
        },
        inject: [
          INBOX_CONFIG,
          MESSAGE_STORE,
          INGESTION_METRICS,
          ConfigurationService,
        ],
      },
      {
        provide: MESSAGE_QUERY_SERVICE,
        useFactory: (
          store: MessageStore,
          configurationService: ConfigurationService,
        ) =>
          new MessageQueryService(store, {
            defaultTimeoutMs: configurationService.getQueryTimeoutMs(),
          }),
        inject: [MESSAGE_STORE, ConfigurationService],
      },
      {
        provide: APP_INTERCEPTOR,
        useClass: RequestLoggingInterceptor,
      },
      {
        provide: APP_FILTER,
        useClass: InboxExceptionFilter,
      },
    ];
  }
}
