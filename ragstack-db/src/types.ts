import type { Pool } from "pg";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";

export type DatabaseMode = "postgres" | "memory";

export interface DatabaseConfig {
  /** PostgreSQL connection string; without one the memory database is used */
  databaseUrl?: string;
  useMemoryDb?: boolean;
  /** Environment variable that forces the memory database when "true", e.g. RUNTIME_USE_MEMORY_DB */
  memoryDbEnvVar?: string;
  /** DDL run against a fresh pg-mem instance */
  memorySchema?: string;
  /** Maximum pooled PostgreSQL clients (node-postgres default when unset) */
  poolSize?: number;
  /** Prefix for log lines */
  serviceId?: string;
  enableLogging?: boolean;
}

export interface DatabaseInstance<TSchema extends Record<string, unknown>> {
  db: NodePgDatabase<TSchema>;
  pool: Pool;
  mode: DatabaseMode;
  isMemory: boolean;
  /** Round-trip a trivial query; false when the database cannot answer */
  ping: () => Promise<boolean>;
  /** Idempotent */
  close: () => Promise<void>;
}
