import { readFileSync } from "node:fs";
import { sql } from "drizzle-orm";
import { log } from "@/lib/logger";
import type { Database } from "./client";

const SCHEMA_FILE = new URL("./migrations/0000_init.sql", import.meta.url);

/** Statements of the schema file, in order. Every statement is idempotent. */
export function schemaStatements(source: string = readFileSync(SCHEMA_FILE, "utf8")): string[] {
  return source
    .split(/;\s*(?:\n|$)/)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export async function applySchema(db: Database): Promise<void> {
  const statements = schemaStatements();
  for (const statement of statements) {
    await db.execute(sql.raw(statement));
  }
  log.info("db_schema_applied", { statements: statements.length });
}
