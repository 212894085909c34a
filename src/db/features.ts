import { asc, eq, notInArray } from "drizzle-orm";
import { log } from "@/lib/logger";
import type { AggregatedFeatureVector } from "@/lib/types";
import type { Database } from "./client";
import { movieFeatures } from "./schema";
import type { MovieFeatureRow, NewMovieFeatureRow } from "./schema";

/** Bump when a feature definition changes; older rows are then ignored by `list()`. */
export const CURRENT_FEATURE_VERSION = 1;

export interface FeatureStore {
  /** Replace the stored vector for `vector.movieId` wholesale. */
  replace(vector: AggregatedFeatureVector): Promise<void>;
  list(): Promise<AggregatedFeatureVector[]>;
  /** Delete every vector whose movie id is not in `movieIds`; returns the ids removed. */
  retainOnly(movieIds: readonly string[]): Promise<string[]>;
}

// ─── Pure mapping functions ───────────────────────────────────────────────────

export function vectorToRow(vector: AggregatedFeatureVector, computedAt: Date): NewMovieFeatureRow {
  return { ...vector, featureVersion: CURRENT_FEATURE_VERSION, computedAt };
}

export function rowToVector(row: MovieFeatureRow): AggregatedFeatureVector {
  return {
    movieId: row.movieId,
    observedDays: row.observedDays,
    hasWeek2Data: row.hasWeek2Data,
    openingTheaters: row.openingTheaters,
    peakTheaters: row.peakTheaters,
    avgTheaters: row.avgTheaters,
    minTheaters: row.minTheaters,
    theaterStd: row.theaterStd,
    expansionRatio: row.expansionRatio,
    openingDayGross: row.openingDayGross,
    peakDailyGross: row.peakDailyGross,
    meanDailyGross: row.meanDailyGross,
    dailyGrossStd: row.dailyGrossStd,
    openingPerTheater: row.openingPerTheater,
    peakPerTheater: row.peakPerTheater,
    meanPerTheater: row.meanPerTheater,
    perTheaterStd: row.perTheaterStd,
    perTheaterSlope: row.perTheaterSlope,
    meanYdChangePct: row.meanYdChangePct,
    ydChangeStd: row.ydChangeStd,
    meanLwChangePct: row.meanLwChangePct,
    lwChangeStd: row.lwChangeStd,
    maxYdChangePct: row.maxYdChangePct,
    minYdChangePct: row.minYdChangePct,
    opening3DayGross: row.opening3DayGross,
    opening3DayPerTheater: row.opening3DayPerTheater,
    week1MeanGross: row.week1MeanGross,
    week2MeanGross: row.week2MeanGross,
    week1MeanTheaters: row.week1MeanTheaters,
    week2Week1Ratio: row.week2Week1Ratio,
    frontLoadingRatio: row.frontLoadingRatio,
    maxDaysInRelease: row.maxDaysInRelease,
    lastCumulativeGross: row.lastCumulativeGross,
  };
}

// ─── Postgres implementation ──────────────────────────────────────────────────

export class PgFeatureStore implements FeatureStore {
  constructor(private readonly db: Database) {}

  async replace(vector: AggregatedFeatureVector): Promise<void> {
    const row = vectorToRow(vector, new Date());
    // Delete + insert so a vector is never a mix of two runs
    await this.db.transaction(async (tx) => {
      await tx.delete(movieFeatures).where(eq(movieFeatures.movieId, vector.movieId));
      await tx.insert(movieFeatures).values(row);
    });
    log.debug("features_replaced", { movieId: vector.movieId, observedDays: vector.observedDays });
  }

  async retainOnly(movieIds: readonly string[]): Promise<string[]> {
    const removed =
      movieIds.length > 0
        ? await this.db
            .delete(movieFeatures)
            .where(notInArray(movieFeatures.movieId, [...movieIds]))
            .returning({ movieId: movieFeatures.movieId })
        : await this.db.delete(movieFeatures).returning({ movieId: movieFeatures.movieId });
    const ids = removed.map((r) => r.movieId).sort();
    if (ids.length > 0) log.info("features_pruned", { count: ids.length, movieIds: ids });
    return ids;
  }

  async list(): Promise<AggregatedFeatureVector[]> {
    const rows = await this.db
      .select()
      .from(movieFeatures)
      .where(eq(movieFeatures.featureVersion, CURRENT_FEATURE_VERSION))
      .orderBy(asc(movieFeatures.movieId));
    return rows.map(rowToVector);
  }
}
