import { newDb, DataType } from "pg-mem";
import type { Pool } from "pg";
import { randomUUID } from "crypto";

type PoolQuery = (query: unknown, ...args: unknown[]) => Promise<unknown>;

interface QueryConfigLike {
  rowMode?: string;
  types?: unknown;
  [key: string]: unknown;
}

function isQueryConfig(value: unknown): value is QueryConfigLike {
  return typeof value === "object" && value !== null;
}

function toArrayRows(result: unknown): unknown {
  if (typeof result !== "object" || result === null || !("rows" in result)) {
    return result;
  }
  const { rows } = result;
  if (!Array.isArray(rows)) {
    return result;
  }
  const fields = "fields" in result && Array.isArray(result.fields) ? result.fields : [];
  const names: string[] = fields
    .map((field: unknown) =>
      typeof field === "object" && field !== null && "name" in field ? String(field.name) : ""
    )
    .filter((name) => name.length > 0);

  const arrayRows = rows.map((row: unknown) => {
    if (typeof row !== "object" || row === null) return row;
    const record = new Map(Object.entries(row));
    return names.length > 0 ? names.map((name) => record.get(name)) : [...record.values()];
  });
  return { ...result, rows: arrayRows };
}

/**
 * Wrap pg-mem pool to handle rowMode incompatibilities.
 * Drizzle asks node-postgres for array rows, which pg-mem does not produce.
 */
export function wrapPgMemPool(pool: Pool): Pool {
  const originalQuery = pool.query.bind(pool) as PoolQuery;
  const wrapped: PoolQuery = (query, ...args) => {
    if (isQueryConfig(query)) {
      const wantsArray = query.rowMode === "array";
      const { rowMode: _rowMode, types: _types, ...sanitized } = query;
      return Promise.resolve(originalQuery(sanitized, ...args)).then((result) =>
        wantsArray ? toArrayRows(result) : result
      );
    }
    return originalQuery(query, ...args);
  };
  pool.query = wrapped as typeof pool.query;
  return pool;
}

/**
 * Create an in-memory PostgreSQL database using pg-mem, with the
 * uuid and clock functions the schema defaults rely on.
 */
export function createMemoryDatabase(schemaSQL?: string): Pool {
  const mem = newDb({ autoCreateForeignKeyIndices: true });

  mem.public.registerFunction({
    name: "gen_random_uuid",
    returns: DataType.uuid,
    impure: true,
    implementation: () => randomUUID(),
  });

  mem.public.registerFunction({
    name: "now",
    returns: DataType.timestamptz,
    impure: true,
    implementation: () => new Date(),
  });

  if (schemaSQL) {
    mem.public.none(schemaSQL);
  }

  const adapter = mem.adapters.createPg();
  const pool: Pool = new adapter.Pool();
  return wrapPgMemPool(pool);
}
