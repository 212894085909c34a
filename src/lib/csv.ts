import Papa from "papaparse";
import { z } from "zod";
import { isIsoDate } from "./dates";
import { canonicalSourceUrl } from "./normalize";
import type { AggregatedFeatureVector, FeatureName, MovieIdentity } from "./types";

// ─── Feature table export ─────────────────────────────────────────────────────

/** Column order of the exported feature table. Append only. */
export const FEATURE_NAMES: readonly FeatureName[] = [
  "openingTheaters",
  "peakTheaters",
  "avgTheaters",
  "minTheaters",
  "theaterStd",
  "expansionRatio",
  "openingDayGross",
  "peakDailyGross",
  "meanDailyGross",
  "dailyGrossStd",
  "openingPerTheater",
  "peakPerTheater",
  "meanPerTheater",
  "perTheaterStd",
  "perTheaterSlope",
  "meanYdChangePct",
  "ydChangeStd",
  "meanLwChangePct",
  "lwChangeStd",
  "maxYdChangePct",
  "minYdChangePct",
  "opening3DayGross",
  "opening3DayPerTheater",
  "week1MeanGross",
  "week2MeanGross",
  "week1MeanTheaters",
  "week2Week1Ratio",
  "frontLoadingRatio",
  "maxDaysInRelease",
  "lastCumulativeGross",
];

export const FEATURE_CSV_COLUMNS = ["movieId", "observedDays", "hasWeek2Data", ...FEATURE_NAMES];

/** Null features become empty cells; the consumer treats them as missing. */
export function featuresToCsv(vectors: readonly AggregatedFeatureVector[]): string {
  const data = vectors.map((v) => [
    v.movieId,
    v.observedDays,
    v.hasWeek2Data ? 1 : 0,
    ...FEATURE_NAMES.map((name) => v[name]),
  ]);
  return Papa.unparse({ fields: FEATURE_CSV_COLUMNS, data }, { newline: "\n" });
}

// ─── Catalog import ───────────────────────────────────────────────────────────

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v == null || v.trim() === "" ? null : v.trim()));

const catalogRowSchema = z.object({
  movie_id: z.string().trim().min(1),
  title: z.string().trim().min(1),
  release_date: optionalText.refine((v) => v == null || isIsoDate(v), "not a YYYY-MM-DD date"),
  source_url: optionalText
    .refine((v) => v == null || canonicalSourceUrl(v) != null, "not an absolute URL")
    .transform((v) => (v == null ? null : canonicalSourceUrl(v))),
  tmdb_id: optionalText
    .refine((v) => v == null || /^[1-9]\d*$/.test(v), "not a positive integer")
    .transform((v) => (v == null ? null : Number(v))),
});

export type CatalogCsvEntry = { identity: MovieIdentity; tmdbId: number | null };

export type CatalogCsvResult = {
  entries: CatalogCsvEntry[];
  errors: Array<{ row: number; message: string }>;
};

/**
 * Parse a catalog CSV with the header
 * `movie_id,title,release_date,source_url,tmdb_id`. Invalid rows are left out
 * and reported by their 1-based data row number.
 */
export function parseCatalogCsv(text: string): CatalogCsvResult {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  const entries: CatalogCsvEntry[] = [];
  const errors: CatalogCsvResult["errors"] = [];

  parsed.data.forEach((raw, i) => {
    const row = catalogRowSchema.safeParse(raw);
    if (!row.success) {
      const message = row.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      errors.push({ row: i + 1, message });
      return;
    }
    entries.push({
      identity: {
        movieId: row.data.movie_id,
        canonicalTitle: row.data.title,
        sourceUrl: row.data.source_url,
        releaseDate: row.data.release_date,
      },
      tmdbId: row.data.tmdb_id,
    });
  });

  return { entries, errors };
}
