import {
  pgTable,
  text,
  integer,
  doublePrecision,
  boolean,
  timestamp,
  index,
  uniqueIndex,
  primaryKey,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// Dates are stored as ISO `YYYY-MM-DD` text: they sort chronologically and
// round-trip through every driver unchanged.

// ─── Raw daily records (append-only) ──────────────────────────────────────────

export const dailyRecords = pgTable('daily_records', {
  reportDate: text('report_date').notNull(),
  recordKey: text('record_key').notNull(),
  sourceTitle: text('source_title').notNull(),
  sourceUrl: text('source_url'),
  rank: integer('rank'),
  dailyGross: doublePrecision('daily_gross').notNull(),
  ydChangePct: doublePrecision('yd_change_pct'),
  lwChangePct: doublePrecision('lw_change_pct'),
  theaterCount: integer('theater_count'),
  perTheaterAvg: doublePrecision('per_theater_avg'),
  cumulativeGross: doublePrecision('cumulative_gross'),
  daysInRelease: integer('days_in_release'),
  distributor: text('distributor'),
  collectedAt: timestamp('collected_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  primaryKey({ columns: [table.reportDate, table.recordKey] }),
  index('idx_daily_records_source_url').on(table.sourceUrl),
]);

// ─── Per-date ledger + checkpoint ─────────────────────────────────────────────

export const collectionDates = pgTable('collection_dates', {
  reportDate: text('report_date').primaryKey(),
  status: text('status').notNull(),
  recordCount: integer('record_count').notNull().default(0),
  attempts: integer('attempts').notNull().default(1),
  reason: text('reason'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  check('collection_dates_status_check', sql`${table.status} in ('stored','skipped')`),
]);

export const collectionCheckpoint = pgTable('collection_checkpoint', {
  id: text('id').primaryKey(),
  lastCompletedDate: text('last_completed_date'),
  consecutiveFailureCount: integer('consecutive_failure_count').notNull().default(0),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// ─── Movie catalog ────────────────────────────────────────────────────────────

export const movies = pgTable('movies', {
  movieId: text('movie_id').primaryKey(),
  canonicalTitle: text('canonical_title').notNull(),
  normalizedTitle: text('normalized_title').notNull(),
  sourceUrl: text('source_url'),
  releaseDate: text('release_date'),
  tmdbId: integer('tmdb_id'),
}, (table) => [
  index('idx_movies_normalized_title').on(table.normalizedTitle),
  uniqueIndex('idx_movies_source_url').on(table.sourceUrl).where(sql`${table.sourceUrl} is not null`),
]);

// ─── Feature table (replaced per movie) ───────────────────────────────────────

const feature = (name: string) => doublePrecision(name);

export const movieFeatures = pgTable('movie_features', {
  movieId: text('movie_id').primaryKey(),
  featureVersion: integer('feature_version').notNull(),
  observedDays: integer('observed_days').notNull(),
  hasWeek2Data: boolean('has_week2_data').notNull(),
  openingTheaters: feature('opening_theaters'),
  peakTheaters: feature('peak_theaters'),
  avgTheaters: feature('avg_theaters'),
  minTheaters: feature('min_theaters'),
  theaterStd: feature('theater_std'),
  expansionRatio: feature('expansion_ratio'),
  openingDayGross: feature('opening_day_gross'),
  peakDailyGross: feature('peak_daily_gross'),
  meanDailyGross: feature('mean_daily_gross'),
  dailyGrossStd: feature('daily_gross_std'),
  openingPerTheater: feature('opening_per_theater'),
  peakPerTheater: feature('peak_per_theater'),
  meanPerTheater: feature('mean_per_theater'),
  perTheaterStd: feature('per_theater_std'),
  perTheaterSlope: feature('per_theater_slope'),
  meanYdChangePct: feature('mean_yd_change_pct'),
  ydChangeStd: feature('yd_change_std'),
  meanLwChangePct: feature('mean_lw_change_pct'),
  lwChangeStd: feature('lw_change_std'),
  maxYdChangePct: feature('max_yd_change_pct'),
  minYdChangePct: feature('min_yd_change_pct'),
  opening3DayGross: feature('opening_3day_gross'),
  opening3DayPerTheater: feature('opening_3day_per_theater'),
  week1MeanGross: feature('week1_mean_gross'),
  week2MeanGross: feature('week2_mean_gross'),
  week1MeanTheaters: feature('week1_mean_theaters'),
  week2Week1Ratio: feature('week2_week1_ratio'),
  frontLoadingRatio: feature('front_loading_ratio'),
  maxDaysInRelease: feature('max_days_in_release'),
  lastCumulativeGross: feature('last_cumulative_gross'),
  computedAt: timestamp('computed_at', { withTimezone: true }).notNull().defaultNow(),
});

// ─── Type exports ─────────────────────────────────────────────────────────────

export type DailyRecordRow = typeof dailyRecords.$inferSelect;
export type NewDailyRecordRow = typeof dailyRecords.$inferInsert;
export type MovieRow = typeof movies.$inferSelect;
export type NewMovieRow = typeof movies.$inferInsert;
export type MovieFeatureRow = typeof movieFeatures.$inferSelect;
export type NewMovieFeatureRow = typeof movieFeatures.$inferInsert;
