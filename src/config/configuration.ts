import type { LogLevel } from '@nestjs/common';
import { DEFAULT_DATABASE_URL } from '../adapters/storage/typeorm/typeorm.config';

/**
 * Process configuration, read once at start-up
 */
export interface AppConfiguration {
  port: number;
  databaseUrl: string;
  webhookSecret: string;
  signatureHeader: string;
  logLevel: AppLogLevel;
  queryTimeoutMs: number;
}

export type AppLogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

const LOG_LEVELS: readonly AppLogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

type Environment = Record<string, string | undefined>;

/**
 * Nest log levels enabled for each LOG_LEVEL value
 */
export function toNestLogLevels(level: AppLogLevel): LogLevel[] {
  switch (level) {
    case 'DEBUG':
      return ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];
    case 'INFO':
      return ['fatal', 'error', 'warn', 'log'];
    case 'WARNING':
      return ['fatal', 'error', 'warn'];
    case 'ERROR':
      return ['fatal', 'error'];
  }
}

function parseLogLevel(value: string | undefined): AppLogLevel {
  const normalized = (value || 'INFO').toUpperCase();
  if (normalized === 'WARN') {
    return 'WARNING';
  }
  const level = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (!level) {
    throw new Error(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`,
    );
  }
  return level;
}

function parsePositiveInt(
  name: string,
  value: string | undefined,
  fallback: number,
): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Build configuration from an environment. Throws on invalid values;
 * a missing WEBHOOK_SECRET is left empty here and rejected by
 * validateEnvironment.
 */
export function loadConfiguration(env: Environment = process.env): AppConfiguration {
  return {
    port: parsePositiveInt('PORT', env.PORT, 8000),
    databaseUrl: env.DATABASE_URL || DEFAULT_DATABASE_URL,
    webhookSecret: env.WEBHOOK_SECRET ?? '',
    signatureHeader: env.SIGNATURE_HEADER || 'x-signature',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    queryTimeoutMs: parsePositiveInt('QUERY_TIMEOUT_MS', env.QUERY_TIMEOUT_MS, 5000),
  };
}

/**
 * ConfigModule `validate` hook: the service refuses to start without
 * a webhook secret or with malformed settings.
 */
export function validateEnvironment(env: Environment): Environment {
  const config = loadConfiguration(env);
  if (!config.webhookSecret) {
    throw new Error('WEBHOOK_SECRET must be set');
  }
  return env;
}

/**
 * ConfigModule `load` factory
 */
export default (): AppConfiguration => loadConfiguration();
