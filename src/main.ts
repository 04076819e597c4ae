import 'reflect-metadata';
import { ConsoleLogger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { createApplication } from './app.factory';
import { loadConfiguration, toNestLogLevels } from './config';

async function bootstrap(): Promise<void> {
  const settings = loadConfiguration();
  const logger = new ConsoleLogger({
    json: true,
    logLevels: toNestLogLevels(settings.logLevel),
  });

  const app = await createApplication(AppModule, { logger });
  app.enableShutdownHooks();

  // Swagger configuration
  const config = new DocumentBuilder()
    .setTitle('Webhook Inbox')
    .setDescription(
      'Ingests signed inbound message webhooks exactly once and serves listing and statistics over them.',
    )
    .setVersion('0.1.0')
    .addTag('Ingest', 'Receive signed message webhooks')
    .addTag('Query', 'List messages and aggregate statistics')
    .addTag('Health', 'Liveness, readiness and metrics')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  await app.listen(settings.port, '0.0.0.0');
  logger.log(`Webhook Inbox listening on port ${settings.port}`, 'Bootstrap');
  logger.log(`OpenAPI documentation available at /api`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start Webhook Inbox', error);
  process.exit(1);
});
