import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { InboxModule } from './modules';
import { createTypeORMConfig } from './adapters/storage/typeorm';
import configuration, { validateEnvironment } from './config/configuration';
import type { AppConfiguration } from './config/configuration';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate: validateEnvironment,
    }),
    InboxModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<AppConfiguration, true>) => ({
        storage: {
          type: 'typeorm',
          options: createTypeORMConfig(
            config.get('databaseUrl', { infer: true }),
          ),
        },
        webhook: {
          secret: config.get('webhookSecret', { infer: true }),
          signatureHeader: config.get('signatureHeader', { infer: true }),
        },
        queries: {
          timeoutMs: config.get('queryTimeoutMs', { infer: true }),
        },
      }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
