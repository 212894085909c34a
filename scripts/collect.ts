/**
 * Collect daily box-office reports into Postgres, resuming from the stored
 * checkpoint.
 *
 * Usage:
 *   npx tsx scripts/collect.ts --preset quick
 *   npx tsx scripts/collect.ts --start 2024-05-01 --end 2024-05-31 --strategy calendar
 *   npx tsx scripts/collect.ts --preset recent --aggregate
 *
 * Required env vars: POSTGRES_URL
 * Optional env vars: REPORT_URL_TEMPLATE, FETCH_*, CIRCUIT_BREAKER_THRESHOLD,
 *   CATALOG_SOURCE + TMDB_API_KEY (with --aggregate), LOG_LEVEL
 */

import "dotenv/config";
import { Command } from "commander";
import { closeDb, getDb } from "@/db/client";
import { PgCatalog } from "@/db/catalog";
import { PgFeatureStore } from "@/db/features";
import { applySchema } from "@/db/migrate";
import { PgRecordStore } from "@/db/store";
import {
  parseIsoDateArg,
  parsePositiveInt,
  parsePreset,
  parseStrategy,
  resolveRange,
  selectCatalog,
} from "@/lib/cli";
import { getPipelineConfig } from "@/lib/config";
import { isFatalPipelineError, SystemicBlock } from "@/lib/errors";
import type { RunPreset } from "@/lib/config";
import { createReportFetcher } from "@/lib/fetcher";
import { log } from "@/lib/logger";
import { runAggregation, runCollection } from "@/lib/orchestrator";
import { dailyStrategy } from "@/lib/strategies";
import type { DateStrategy } from "@/lib/strategies";
import type { IsoDate } from "@/lib/types";

type CollectOptions = {
  preset?: RunPreset;
  start?: IsoDate;
  end?: IsoDate;
  strategy?: DateStrategy;
  resumeFrom?: IsoDate;
  retrySkipped?: boolean;
  resetFailures?: boolean;
  threshold?: number;
  aggregate?: boolean;
};

async function main(): Promise<void> {
  const program = new Command()
    .name("collect")
    .description("Fetch daily box-office reports into the raw record store")
    .option("-p, --preset <preset>", "Date range preset (test, quick, recent, full)", parsePreset)
    .option("--start <date>", "First date (YYYY-MM-DD)", parseIsoDateArg)
    .option("--end <date>", "Last date (YYYY-MM-DD)", parseIsoDateArg)
    .option("-s, --strategy <name>", "daily, weekly, biweekly, calendar or every-<n>d", parseStrategy)
    .option("--resume-from <date>", "Override the checkpoint (use after corruption)", parseIsoDateArg)
    .option("--retry-skipped", "Fetch dates that previously failed again")
    .option("--reset-failures", "Clear the consecutive failure count")
    .option("--threshold <n>", "Consecutive failures before halting", parsePositiveInt)
    .option("--aggregate", "Rebuild the feature table after collecting")
    .parse();
  const options = program.opts<CollectOptions>();

  const config = getPipelineConfig(process.env);
  const db = getDb();
  if (!db) {
    log.error("collect_abort", { reason: "POSTGRES_URL not configured" });
    process.exit(1);
  }
  await applySchema(db);

  const range = resolveRange(options);
  const strategy = options.strategy ?? dailyStrategy;
  const store = new PgRecordStore(db);
  const fetcher = createReportFetcher({ urlTemplate: config.reportUrlTemplate, ...config.fetch });

  // First Ctrl-C finishes the current date and stops; a second one exits
  const controller = new AbortController();
  process.once("SIGINT", () => {
    log.warn("collect_interrupt", { hint: "stopping after the current date" });
    controller.abort();
  });

  const summary = await runCollection({
    store,
    fetcher,
    strategy,
    range,
    threshold: options.threshold ?? config.circuitBreakerThreshold,
    signal: controller.signal,
    retrySkipped: options.retrySkipped,
    resetFailures: options.resetFailures,
    resumeFrom: options.resumeFrom,
    logger: log.child({ run: new Date().toISOString() }),
  });

  if (options.aggregate && !summary.cancelled) {
    await runAggregation({
      store,
      catalog: selectCatalog(config, new PgCatalog(db)),
      features: new PgFeatureStore(db),
      windowDays: config.matchWindowDays,
      concurrency: config.aggregateConcurrency,
    });
  }

  await closeDb();
}

function recoveryHint(err: unknown): string | undefined {
  if (!isFatalPipelineError(err)) return undefined;
  return err instanceof SystemicBlock
    ? "check the source, then rerun with --reset-failures"
    : "rerun with --resume-from <date>";
}

main().catch(async (err) => {
  log.error("collect_fatal", {
    error: (err as Error).message,
    name: (err as Error).name,
    hint: recoveryHint(err),
  });
  await closeDb();
  process.exit(1);
});
