/**
 * Load movie identities from CSV into the `movies` table.
 *
 * Usage:
 *   npx tsx scripts/import-catalog.ts data/catalog.csv
 *
 * CSV header: movie_id,title,release_date,source_url,tmdb_id
 * Required env vars: POSTGRES_URL
 */

import "dotenv/config";
import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { identityToRow, PgCatalog } from "@/db/catalog";
import { closeDb, getDb } from "@/db/client";
import { applySchema } from "@/db/migrate";
import { parseCatalogCsv } from "@/lib/csv";
import { log } from "@/lib/logger";

async function main(): Promise<void> {
  const program = new Command()
    .name("import-catalog")
    .description("Upsert catalog entries from a CSV file")
    .argument("<file>", "CSV file to import")
    .option("--strict", "Abort when any row is invalid")
    .parse();
  const [file] = program.args;
  const { strict } = program.opts<{ strict?: boolean }>();

  const { entries, errors } = parseCatalogCsv(await readFile(file, "utf8"));
  for (const error of errors) {
    log.warn("catalog_row_invalid", { file, row: error.row, error: error.message });
  }
  if (strict && errors.length > 0) {
    log.error("import_abort", { file, invalid: errors.length });
    process.exit(1);
  }

  const db = getDb();
  if (!db) {
    log.error("import_abort", { reason: "POSTGRES_URL not configured" });
    process.exit(1);
  }
  await applySchema(db);

  const written = await new PgCatalog(db).upsert(
    entries.map((entry) => identityToRow(entry.identity, entry.tmdbId)),
  );
  log.info("import_complete", { file, written, invalid: errors.length });

  await closeDb();
}

main().catch(async (err) => {
  log.error("import_fatal", { error: (err as Error).message });
  await closeDb();
  process.exit(1);
});
