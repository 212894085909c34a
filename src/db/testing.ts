import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import type { Database } from "./client";
import { applySchema } from "./migrate";
import * as schema from "./schema";

export type TestDb = { db: Database; close: () => Promise<void> };

/** Fresh in-process Postgres with the pipeline schema applied. */
export async function createTestDb(): Promise<TestDb> {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await applySchema(db);
  return { db, close: () => client.close() };
}
