import type { FeatureStore } from "@/db/features";
import type { RecordStore } from "@/db/store";
import { aggregate } from "./aggregator";
import { snapshotCatalog } from "./catalog";
import type { CatalogSource } from "./catalog";
import type { DateRange } from "./config";
import { addDaysIso, maxDate } from "./dates";
import { CheckpointCorruption, SystemicBlock } from "./errors";
import type { ReportFetcher } from "./fetcher";
import { log as rootLog } from "./logger";
import type { Logger } from "./logger";
import { DEFAULT_MATCH_WINDOW_DAYS, match } from "./matcher";
import type { DateStrategy } from "./strategies";
import type { CollectionCheckpoint, DailyRecord, IsoDate } from "./types";

export const DEFAULT_CIRCUIT_BREAKER_THRESHOLD = 10;
export const DEFAULT_AGGREGATE_CONCURRENCY = 5;

// ─── Collection ───────────────────────────────────────────────────────────────

export type CollectionSummary = {
  planned: number;
  alreadyCollected: number;
  stored: number;
  skipped: number;
  records: number;
  cancelled: boolean;
  lastCompletedDate: IsoDate | null;
};

export type CollectionState =
  | { kind: "pending" }
  | { kind: "fetching"; date: IsoDate }
  | { kind: "stored"; date: IsoDate; records: number }
  | { kind: "skipped"; date: IsoDate; reason: string }
  | { kind: "collected"; summary: CollectionSummary }
  | { kind: "halted"; date: IsoDate; error: SystemicBlock }
  | { kind: "cancelled"; summary: CollectionSummary };

export type CollectionOptions = {
  store: RecordStore;
  fetcher: ReportFetcher;
  strategy: DateStrategy;
  range: DateRange;
  /** Consecutive failed dates tolerated before the run halts. */
  threshold?: number;
  signal?: AbortSignal;
  /** Fetch dates the ledger marks as skipped again. */
  retrySkipped?: boolean;
  /** Start from a zero failure count whatever the checkpoint says. */
  resetFailures?: boolean;
  /** Explicit resume date; replaces the stored checkpoint, corrupt or not. */
  resumeFrom?: IsoDate;
  onTransition?: (state: CollectionState) => void;
  logger?: Logger;
};

async function loadCheckpoint(
  store: RecordStore,
  resumeFrom: IsoDate | undefined,
  logger: Logger,
): Promise<CollectionCheckpoint> {
  if (resumeFrom === undefined) return store.readCheckpoint();

  let failures = 0;
  try {
    failures = (await store.readCheckpoint()).consecutiveFailureCount;
  } catch (err) {
    if (!(err instanceof CheckpointCorruption)) throw err;
    logger.warn("checkpoint_corrupt_overridden", { detail: err.detail, resumeFrom });
  }
  const checkpoint = { lastCompletedDate: addDaysIso(resumeFrom, -1), consecutiveFailureCount: failures };
  await store.writeCheckpoint(checkpoint);
  return checkpoint;
}

/**
 * Fetch and store every date the strategy picks inside `range`, one date at a
 * time. Each date is committed together with the checkpoint, so an
 * interrupted run resumes where it stopped. Dates at or before the checkpoint
 * and dates already stored are never fetched again.
 *
 * Throws `SystemicBlock` when more than `threshold` dates in a row fail, and
 * `CheckpointCorruption` when the checkpoint is unreadable and no
 * `resumeFrom` was given.
 */
export async function runCollection(options: CollectionOptions): Promise<CollectionSummary> {
  const { store, fetcher, strategy, range, signal } = options;
  const threshold = options.threshold ?? DEFAULT_CIRCUIT_BREAKER_THRESHOLD;
  const logger = (options.logger ?? rootLog).child({ phase: "collect" });

  const transition = (state: CollectionState) => {
    if (state.kind !== "collected" && state.kind !== "cancelled") {
      logger.debug("collection_state", { ...state, error: undefined });
    }
    options.onTransition?.(state);
  };

  let checkpoint = await loadCheckpoint(store, options.resumeFrom, logger);
  if (options.resetFailures && checkpoint.consecutiveFailureCount > 0) {
    logger.info("failure_count_reset", { previous: checkpoint.consecutiveFailureCount });
    checkpoint = { ...checkpoint, consecutiveFailureCount: 0 };
    await store.writeCheckpoint(checkpoint);
  }

  const retry = new Set(options.retrySkipped ? await store.listSkippedDates() : []);
  const dates = strategy.dates(range.start, range.end);
  const summary: CollectionSummary = {
    planned: dates.length,
    alreadyCollected: 0,
    stored: 0,
    skipped: 0,
    records: 0,
    cancelled: false,
    lastCompletedDate: checkpoint.lastCompletedDate,
  };

  logger.info("collection_started", {
    strategy: strategy.name,
    start: range.start,
    end: range.end,
    planned: dates.length,
    checkpoint: checkpoint.lastCompletedDate,
    failures: checkpoint.consecutiveFailureCount,
  });
  transition({ kind: "pending" });

  for (const date of dates) {
    if (signal?.aborted) {
      summary.cancelled = true;
      break;
    }

    const behindCheckpoint =
      checkpoint.lastCompletedDate != null && date <= checkpoint.lastCompletedDate;
    if ((behindCheckpoint && !retry.has(date)) || (await store.has(date))) {
      summary.alreadyCollected += 1;
      continue;
    }

    transition({ kind: "fetching", date });
    const outcome = await fetcher.fetchAndParse(date);

    if (outcome.ok) {
      checkpoint = {
        lastCompletedDate: maxDate(checkpoint.lastCompletedDate, date),
        consecutiveFailureCount: 0,
      };
      const { inserted } = await store.append(date, outcome.records, checkpoint, outcome.attempts);
      summary.stored += 1;
      summary.records += inserted;
      transition({ kind: "stored", date, records: inserted });
    } else {
      const failures = checkpoint.consecutiveFailureCount + 1;
      if (failures > threshold) {
        const error = new SystemicBlock(failures, threshold, date);
        logger.error("collection_halted", {
          date,
          failures,
          threshold,
          reason: outcome.error.reason,
          error: outcome.error.message,
        });
        transition({ kind: "halted", date, error });
        throw error;
      }
      checkpoint = {
        lastCompletedDate: maxDate(checkpoint.lastCompletedDate, date),
        consecutiveFailureCount: failures,
      };
      const reason = `${outcome.error.reason}: ${outcome.error.message}`;
      await store.markSkipped(date, reason, checkpoint, outcome.error.attempts);
      summary.skipped += 1;
      transition({ kind: "skipped", date, reason });
    }

    transition({ kind: "pending" });
  }

  summary.lastCompletedDate = checkpoint.lastCompletedDate;
  if (summary.cancelled) {
    logger.warn("collection_cancelled", { ...summary });
    transition({ kind: "cancelled", summary });
  } else {
    logger.info("collection_finished", { ...summary });
    transition({ kind: "collected", summary });
  }
  return summary;
}

// ─── Aggregation ──────────────────────────────────────────────────────────────

export type AggregationOptions = {
  store: RecordStore;
  catalog: CatalogSource;
  features: FeatureStore;
  windowDays?: number;
  /** Movies aggregated at once. */
  concurrency?: number;
  /** Only rebuild these movies. */
  movieIds?: readonly string[];
  logger?: Logger;
};

export type AggregationSummary = {
  records: number;
  matched: number;
  ambiguous: number;
  unmatched: number;
  movies: number;
  written: number;
  /** Movies whose stored vector was dropped because no record matches them any more. */
  pruned: number;
  failed: Array<{ movieId: string; error: string }>;
};

/** Records grouped by matched movie, each group in date order. */
export function groupByMovie(
  records: readonly DailyRecord[],
  movieIdOf: (record: DailyRecord) => string | null,
): Map<string, DailyRecord[]> {
  const groups = new Map<string, DailyRecord[]>();
  for (const record of records) {
    const movieId = movieIdOf(record);
    if (movieId == null) continue;
    const group = groups.get(movieId);
    if (group) group.push(record);
    else groups.set(movieId, [record]);
  }
  for (const group of groups.values()) {
    group.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }
  return groups;
}

/**
 * Match every stored record to the catalog and rebuild the feature vector of
 * each matched movie. One movie failing is logged and does not stop the rest.
 * Without `movieIds`, vectors of movies no record matches any more are removed.
 */
export async function runAggregation(options: AggregationOptions): Promise<AggregationSummary> {
  const windowDays = options.windowDays ?? DEFAULT_MATCH_WINDOW_DAYS;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_AGGREGATE_CONCURRENCY);
  const logger = (options.logger ?? rootLog).child({ phase: "aggregate" });

  const records = await options.store.listRecords();
  const snapshot = await snapshotCatalog(options.catalog, records);
  logger.info("catalog_snapshot", { records: records.length, catalogEntries: snapshot.size });

  const summary: AggregationSummary = {
    records: records.length,
    matched: 0,
    ambiguous: 0,
    unmatched: 0,
    movies: 0,
    written: 0,
    pruned: 0,
    failed: [],
  };

  const groups = groupByMovie(records, (record) => {
    const result = match(record, snapshot, { windowDays });
    if (result.movieId == null) {
      summary.unmatched += 1;
      logger.debug("match_unmatched", { date: record.date, key: result.recordKey, title: record.sourceTitle });
      return null;
    }
    summary.matched += 1;
    if (result.ambiguous) {
      summary.ambiguous += 1;
      logger.info("match_ambiguous_resolved", {
        date: record.date,
        key: result.recordKey,
        movieId: result.movieId,
        candidates: result.candidateCount,
      });
    }
    return result.movieId;
  });

  const wanted = options.movieIds ? new Set(options.movieIds) : null;
  const movieIds = [...groups.keys()].filter((id) => wanted == null || wanted.has(id)).sort();
  summary.movies = movieIds.length;

  for (let i = 0; i < movieIds.length; i += concurrency) {
    const batch = movieIds.slice(i, i + concurrency);
    const results = await Promise.allSettled(
      batch.map(async (movieId) => {
        const releaseDate = snapshot.byId(movieId)?.releaseDate ?? null;
        const vector = aggregate(movieId, groups.get(movieId) ?? [], releaseDate);
        await options.features.replace(vector);
      }),
    );
    results.forEach((result, j) => {
      if (result.status === "fulfilled") {
        summary.written += 1;
        return;
      }
      const movieId = batch[j];
      const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
      summary.failed.push({ movieId, error });
      logger.error("aggregate_failed", { movieId, error });
    });
  }

  // A full pass leaves exactly the movies that match now
  if (wanted == null) {
    summary.pruned = (await options.features.retainOnly([...groups.keys()])).length;
  }

  logger.info("aggregation_finished", {
    records: summary.records,
    matched: summary.matched,
    ambiguous: summary.ambiguous,
    unmatched: summary.unmatched,
    movies: summary.movies,
    written: summary.written,
    pruned: summary.pruned,
    failed: summary.failed.length,
  });
  return summary;
}

// ─── Full pipeline ────────────────────────────────────────────────────────────

export type PipelineOptions = CollectionOptions &
  Omit<AggregationOptions, "store" | "logger" | "movieIds">;

export async function runPipeline(
  options: PipelineOptions,
): Promise<{ collection: CollectionSummary; aggregation: AggregationSummary | null }> {
  const collection = await runCollection(options);
  if (collection.cancelled) return { collection, aggregation: null };
  const aggregation = await runAggregation(options);
  return { collection, aggregation };
}
