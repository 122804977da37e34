/**
 * @ragstack/db
 *
 * drizzle over node-postgres, with pg-mem standing in when DATABASE_URL is unset.
 */

export * from "./types.js";
export * from "./database.js";
export * from "./memory.js";
