import { initializeDatabase, getDatabaseConfig, type DatabaseConfig, type DatabaseInstance } from '@ragstack/db';
import * as schema from '../../shared/schema.js';
import { MEMORY_SCHEMA_SQL } from './memory-schema.js';

export type RuntimeSchema = typeof schema;
export type RuntimeDatabase = DatabaseInstance<RuntimeSchema>['db'];

/**
 * PostgreSQL when DATABASE_URL is set, pg-mem otherwise
 * (or when RUNTIME_USE_MEMORY_DB=true).
 */
export function createRuntimeDatabase(overrides: Partial<DatabaseConfig> = {}): DatabaseInstance<RuntimeSchema> {
  return initializeDatabase({
    serviceId: 'runtime',
    memorySchema: MEMORY_SCHEMA_SQL,
    ...getDatabaseConfig('RUNTIME'),
    ...overrides,
  }, schema);
}
