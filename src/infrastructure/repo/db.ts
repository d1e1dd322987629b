import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: Database | null = null;

export function getDb(databaseUrl: string): Database {
  if (db) {
    return db;
  }
  pool = new pg.Pool({ connectionString: databaseUrl, max: 5 });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb() {
  const current = pool;
  pool = null;
  db = null;
  await current?.end();
}
