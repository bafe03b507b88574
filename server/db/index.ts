import { Pool } from "pg";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import * as schema from "../../shared/schema";

export type LendingDb = NodePgDatabase<typeof schema>;

export function createDbPool(connectionString: string): Pool {
  return new Pool({ connectionString });
}

export function createLendingDb(pool: Pool): LendingDb {
  return drizzle(pool, { schema });
}
