import type { DynamicModule, NestApplicationOptions, Type } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';

/**
 * Create the HTTP application around an entry module.
 *
 * Nest's JSON parser is disabled: every body, whatever its content type,
 * reaches the handlers as the raw bytes the signature was computed over.
 * Payloads are decoded only after verification.
 */
export async function createApplication(
  entry: Type<unknown> | DynamicModule,
  options: Omit<NestApplicationOptions, 'rawBody' | 'bodyParser'> = {},
): Promise<NestExpressApplication> {
  const app = await NestFactory.create<NestExpressApplication>(entry, {
    ...options,
    rawBody: true,
    bodyParser: false,
  });

  app.useBodyParser('raw', { type: () => true });

  return app;
}
