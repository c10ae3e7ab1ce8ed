import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type DbOptions = {
  maxConnections: number;
};

export type DbHandle = {
  db: PostgresJsDatabase;
  close: () => Promise<void>;
};

/**
 * Opens the checkpoint database. `close` drains the pool, waiting up to five seconds for
 * in-flight statements.
 */
export const createDb = (
  connectionString: string,
  options: DbOptions,
): DbHandle => {
  const sql = postgres(connectionString, {
    max: options.maxConnections,
    onnotice: () => undefined,
  });

  return {
    db: drizzle(sql),
    close: async () => {
      await sql.end({ timeout: 5 });
    },
  };
};
