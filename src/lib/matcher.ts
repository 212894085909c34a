import type { CatalogSnapshot } from "./catalog";
import { addDaysIso, diffDays } from "./dates";
import { normalizeTitle, recordKey } from "./normalize";
import type { DailyRecord, IsoDate, MatchResult, MovieIdentity } from "./types";

export const DEFAULT_MATCH_WINDOW_DAYS = 14;

export type MatchOptions = {
  windowDays?: number;
};

/**
 * Release date implied by the report: the record's date minus its days in
 * release. Falls back to the record's date when the column was missing.
 */
export function estimatedReleaseDate(record: DailyRecord): IsoDate {
  if (record.daysInRelease == null) return record.date;
  return addDaysIso(record.date, -record.daysInRelease);
}

type Eligible = { identity: MovieIdentity; releaseDate: IsoDate; distance: number };

function compareEligible(a: Eligible, b: Eligible): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.releaseDate !== b.releaseDate) return a.releaseDate < b.releaseDate ? -1 : 1;
  return a.identity.movieId < b.identity.movieId ? -1 : 1;
}

/**
 * Resolve a raw record to a catalog identity. Pure: the same record and
 * snapshot always give the same result, tie-breaks included.
 *
 * Order: exact source URL, then normalized title with a release date inside
 * ±windowDays of the estimated release; several such candidates go to the
 * one released closest to the estimate (then earliest, then lowest id).
 */
export function match(
  record: DailyRecord,
  catalog: CatalogSnapshot,
  options: MatchOptions = {},
): MatchResult {
  const windowDays = options.windowDays ?? DEFAULT_MATCH_WINDOW_DAYS;
  const base = { recordKey: recordKey(record), date: record.date };

  if (record.sourceUrl) {
    const exact = catalog.byUrl(record.sourceUrl);
    if (exact) {
      return {
        ...base,
        movieId: exact.movieId,
        confidence: "exact",
        method: "source_url",
        ambiguous: false,
        candidateCount: 1,
      };
    }
  }

  const estimate = estimatedReleaseDate(record);
  const titleKey = normalizeTitle(record.sourceTitle);
  const eligible: Eligible[] = [];
  // A title with no letters or digits matches nothing
  for (const identity of titleKey ? catalog.listCandidates(titleKey) : []) {
    if (identity.releaseDate == null) continue;
    const distance = Math.abs(diffDays(identity.releaseDate, estimate));
    if (distance <= windowDays) {
      eligible.push({ identity, releaseDate: identity.releaseDate, distance });
    }
  }

  if (eligible.length === 0) {
    return {
      ...base,
      movieId: null,
      confidence: "unmatched",
      method: "none",
      ambiguous: false,
      candidateCount: 0,
    };
  }

  const [best] = [...eligible].sort(compareEligible);
  const ambiguous = eligible.length > 1;
  return {
    ...base,
    movieId: best.identity.movieId,
    confidence: "fuzzy",
    method: ambiguous ? "title_tiebreak" : "title_window",
    ambiguous,
    candidateCount: eligible.length,
  };
}
