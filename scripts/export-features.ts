/**
 * Write the feature table as CSV.
 *
 * Usage:
 *   npx tsx scripts/export-features.ts --out data/features.csv
 *
 * Required env vars: POSTGRES_URL
 */

import "dotenv/config";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Command } from "commander";
import { closeDb, getDb } from "@/db/client";
import { PgFeatureStore } from "@/db/features";
import { featuresToCsv } from "@/lib/csv";
import { log } from "@/lib/logger";

async function main(): Promise<void> {
  const program = new Command()
    .name("export-features")
    .description("Export movie feature vectors to CSV")
    .option("-o, --out <file>", "Output file", "data/features.csv")
    .parse();
  const { out } = program.opts<{ out: string }>();

  const db = getDb();
  if (!db) {
    log.error("export_abort", { reason: "POSTGRES_URL not configured" });
    process.exit(1);
  }

  const vectors = await new PgFeatureStore(db).list();
  await mkdir(dirname(out), { recursive: true });
  await writeFile(out, featuresToCsv(vectors), "utf8");
  log.info("export_complete", { out, movies: vectors.length });

  await closeDb();
}

main().catch(async (err) => {
  log.error("export_fatal", { error: (err as Error).message });
  await closeDb();
  process.exit(1);
});
