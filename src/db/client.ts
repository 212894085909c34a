import { drizzle } from "drizzle-orm/neon-serverless";
import { Pool, neonConfig } from "@neondatabase/serverless";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import ws from "ws";
import { log } from "@/lib/logger";
import * as schema from "./schema";

/** Driver-independent handle: Neon in production, PGlite in tests. */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

// undefined = not initialized, null = disabled, Database = active
let dbClient: Database | null | undefined;
let pool: Pool | null = null;

export function getDb(): Database | null {
  if (dbClient !== undefined) return dbClient;

  const url = process.env.POSTGRES_URL;
  if (!url) {
    log.info("db_disabled", { reason: "Missing POSTGRES_URL env var" });
    dbClient = null;
    return null;
  }

  try {
    // Node 20 has no global WebSocket
    neonConfig.webSocketConstructor = ws;
    pool = new Pool({ connectionString: url });
    dbClient = drizzle(pool, { schema });
    log.info("db_enabled");
    return dbClient;
  } catch (err) {
    log.warn("db_init_failed", { error: (err as Error).message });
    dbClient = null;
    return null;
  }
}

/** Close the pool so scripts can exit. */
export async function closeDb(): Promise<void> {
  const current = pool;
  pool = null;
  dbClient = undefined;
  if (current) await current.end();
}

/** Reset client for testing; the next getDb() re-reads the environment. */
export function _resetDbClient(): void {
  dbClient = undefined;
  pool = null;
}
