/**
 * TypeORM Storage Adapter for SQLite and PostgreSQL
 */

export { TypeORMStorageAdapter } from './typeorm-storage.adapter';
export {
  createDataSource,
  createTypeORMConfig,
  DEFAULT_DATABASE_URL,
  registerSqliteFunctions,
} from './typeorm.config';
export type { TypeORMConfigOverrides } from './typeorm.config';
export * from './entities';
