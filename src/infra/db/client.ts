import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Builds the typed ORM over a dedicated postgres.js pool; queries never block the event loop.
 */
export const createDb = (connectionString: string, poolMax = 10) => {
  const sql = postgres(connectionString, { max: poolMax });
  const db = drizzle(sql);
  return { db, sql };
};

export type Database = ReturnType<typeof createDb>["db"];
