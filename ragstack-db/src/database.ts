import { drizzle } from "drizzle-orm/node-postgres";
import pg from "pg";
import type { DatabaseConfig, DatabaseInstance, DatabaseMode } from "./types.js";
import { createMemoryDatabase } from "./memory.js";

function resolveMode(config: DatabaseConfig, databaseUrl: string | undefined): DatabaseMode {
  if (config.useMemoryDb || !databaseUrl) return "memory";
  if (config.memoryDbEnvVar && process.env[config.memoryDbEnvVar] === "true") return "memory";
  return "postgres";
}

/**
 * Connect drizzle to PostgreSQL, or to pg-mem when no connection string is
 * configured or memory mode is forced.
 *
 * @example
 * ```typescript
 * const database = initializeDatabase({ serviceId: 'runtime', memorySchema: MEMORY_SCHEMA_SQL }, schema);
 * const rows = await database.db.select().from(schema.workflows);
 * ```
 */
export function initializeDatabase<TSchema extends Record<string, unknown>>(
  config: DatabaseConfig,
  schema: TSchema
): DatabaseInstance<TSchema> {
  const databaseUrl = config.databaseUrl ?? process.env.DATABASE_URL;
  const serviceId = config.serviceId ?? "db";
  const logging = config.enableLogging ?? true;
  const mode = resolveMode(config, databaseUrl);

  let pool: pg.Pool;
  if (mode === "memory") {
    pool = createMemoryDatabase(config.memorySchema);
  } else {
    pool = new pg.Pool({ connectionString: databaseUrl, max: config.poolSize });
    // An idle client losing its connection is reported here; unhandled it would crash the process
    pool.on("error", (error) => {
      console.error(`[${serviceId}] Idle database client error: ${error.message}`);
    });
  }

  if (logging) {
    console.log(`[${serviceId}] Database mode: ${mode === "memory" ? "in-memory (pg-mem)" : "PostgreSQL"}`);
  }

  let closed = false;

  async function ping(): Promise<boolean> {
    if (closed) return false;
    try {
      await pool.query("SELECT 1");
      return true;
    } catch (error) {
      console.error(`[${serviceId}] Database ping failed:`, error);
      return false;
    }
  }

  async function close(): Promise<void> {
    if (closed) return;
    closed = true;
    await pool.end();
    if (logging) {
      console.log(`[${serviceId}] Database pool closed`);
    }
  }

  return {
    db: drizzle(pool, { schema }),
    pool,
    mode,
    isMemory: mode === "memory",
    ping,
    close,
  };
}

function parsePoolSize(value: string | undefined): number | undefined {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isNaN(parsed) || parsed <= 0 ? undefined : parsed;
}

/**
 * Settings from DATABASE_URL and DATABASE_POOL_SIZE. With a service
 * prefix, `<PREFIX>_USE_MEMORY_DB=true` forces the memory database.
 */
export function getDatabaseConfig(servicePrefix?: string): Partial<DatabaseConfig> {
  return {
    databaseUrl: process.env.DATABASE_URL,
    poolSize: parsePoolSize(process.env.DATABASE_POOL_SIZE),
    ...(servicePrefix ? { memoryDbEnvVar: `${servicePrefix}_USE_MEMORY_DB` } : {}),
  };
}
