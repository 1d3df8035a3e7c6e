import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

/**
 * Builds the typed ORM over one postgres-js pool; `close` drains the pool so one-shot runs can exit.
 */
export const createDb = (connectionString: string) => {
  const sql = postgres(connectionString, { max: 5, onnotice: () => {} });
  const db = drizzle(sql);
  const close = async (): Promise<void> => {
    await sql.end({ timeout: 5 });
  };
  return { db, sql, close };
};

export type Database = ReturnType<typeof createDb>["db"];
