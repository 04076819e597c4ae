import type { Database } from 'better-sqlite3';
import { DataSource, DataSourceOptions } from 'typeorm';
import { MessageEntity } from './entities';

export const DEFAULT_DATABASE_URL = 'sqlite:////data/app.db';

const SQLITE_PREFIX = 'sqlite:///';
const POSTGRES_PREFIXES = ['postgres://', 'postgresql://'];

/**
 * SQLite's built-in LOWER only folds ASCII. Replacing it per connection
 * keeps `q` matching identical to PostgreSQL and the in-memory store.
 */
export const registerSqliteFunctions = (db: Database): void => {
  db.function('lower', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  );
};

export interface TypeORMConfigOverrides {
  synchronize?: boolean;
  logging?: boolean;
  poolSize?: number;
}

/**
 * TypeORM configuration built from a database URL
 *
 *   sqlite:///relative/app.db   -> better-sqlite3, relative path
 *   sqlite:////data/app.db      -> better-sqlite3, absolute path
 *   sqlite:///:memory:          -> better-sqlite3, in-memory
 *   postgres://user:pw@host/db  -> pg
 */
export const createTypeORMConfig = (
  databaseUrl: string = process.env.DATABASE_URL || DEFAULT_DATABASE_URL,
  overrides: TypeORMConfigOverrides = {},
): DataSourceOptions => {
  const synchronize = overrides.synchronize ?? true;
  const logging = overrides.logging ?? process.env.DB_LOGGING === 'true';

  if (databaseUrl.startsWith(SQLITE_PREFIX)) {
    const database = databaseUrl.slice(SQLITE_PREFIX.length);
    if (!database) {
      throw new Error(`DATABASE_URL has no database path: ${databaseUrl}`);
    }

    return {
      type: 'better-sqlite3',
      database,
      prepareDatabase: registerSqliteFunctions,
      entities: [MessageEntity],
      synchronize,
      logging,
    };
  }

  if (POSTGRES_PREFIXES.some((prefix) => databaseUrl.startsWith(prefix))) {
    return {
      type: 'postgres',
      url: databaseUrl,
      entities: [MessageEntity],
      synchronize,
      logging,
      // Connection pool settings
      extra: {
        max: overrides.poolSize ?? 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      },
    };
  }

  throw new Error(
    `Unsupported DATABASE_URL scheme: ${databaseUrl.split(':')[0]}`,
  );
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (
  databaseUrl?: string,
  overrides?: TypeORMConfigOverrides,
): DataSource => {
  return new DataSource(createTypeORMConfig(databaseUrl, overrides));
};
