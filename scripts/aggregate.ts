/**
 * Match stored records to the movie catalog and rebuild the feature table.
 *
 * Usage:
 *   npx tsx scripts/aggregate.ts
 *   npx tsx scripts/aggregate.ts --movie m-123 --movie m-456
 *
 * Required env vars: POSTGRES_URL
 * Optional env vars: CATALOG_SOURCE, TMDB_API_KEY, KV_REST_API_URL + KV_REST_API_TOKEN,
 *   MATCH_WINDOW_DAYS, AGGREGATE_CONCURRENCY
 */

import "dotenv/config";
import { Command } from "commander";
import { PgCatalog } from "@/db/catalog";
import { closeDb, getDb } from "@/db/client";
import { PgFeatureStore } from "@/db/features";
import { applySchema } from "@/db/migrate";
import { PgRecordStore } from "@/db/store";
import { parsePositiveInt, selectCatalog } from "@/lib/cli";
import { getPipelineConfig } from "@/lib/config";
import { log } from "@/lib/logger";
import { runAggregation } from "@/lib/orchestrator";

type AggregateOptions = { movie?: string[]; concurrency?: number };

function collectMovie(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

async function main(): Promise<void> {
  const program = new Command()
    .name("aggregate")
    .description("Rebuild per-movie feature vectors from stored records")
    .option("-m, --movie <id>", "Only rebuild this movie (repeatable)", collectMovie)
    .option("-c, --concurrency <n>", "Movies aggregated at once", parsePositiveInt)
    .parse();
  const options = program.opts<AggregateOptions>();

  const config = getPipelineConfig(process.env);
  const db = getDb();
  if (!db) {
    log.error("aggregate_abort", { reason: "POSTGRES_URL not configured" });
    process.exit(1);
  }
  await applySchema(db);

  const summary = await runAggregation({
    store: new PgRecordStore(db),
    catalog: selectCatalog(config, new PgCatalog(db)),
    features: new PgFeatureStore(db),
    windowDays: config.matchWindowDays,
    concurrency: options.concurrency ?? config.aggregateConcurrency,
    movieIds: options.movie,
  });

  await closeDb();
  if (summary.failed.length > 0) process.exitCode = 1;
}

main().catch(async (err) => {
  log.error("aggregate_fatal", { error: (err as Error).message });
  await closeDb();
  process.exit(1);
});
