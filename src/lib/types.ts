/** Calendar date in `YYYY-MM-DD` form. Lexicographic order is chronological. */
export type IsoDate = string;

export type DailyRecord = {
  date: IsoDate;
  sourceTitle: string;
  sourceUrl: string | null;
  rank: number | null;
  dailyGross: number;
  ydChangePct: number | null; // % change vs. previous day
  lwChangePct: number | null; // % change vs. same day last week
  theaterCount: number | null;
  perTheaterAvg: number | null;
  cumulativeGross: number | null;
  daysInRelease: number | null;
  distributor: string | null;
};

export type MovieIdentity = {
  movieId: string;
  canonicalTitle: string;
  sourceUrl: string | null;
  releaseDate: IsoDate | null;
};

export type MatchConfidence = "exact" | "fuzzy" | "unmatched";

export type MatchMethod = "source_url" | "title_window" | "title_tiebreak" | "none";

export type MatchResult = {
  recordKey: string;
  date: IsoDate;
  movieId: string | null;
  confidence: MatchConfidence;
  method: MatchMethod;
  ambiguous: boolean;
  candidateCount: number;
};

export type CollectionCheckpoint = {
  lastCompletedDate: IsoDate | null;
  consecutiveFailureCount: number;
};

export const EMPTY_CHECKPOINT: CollectionCheckpoint = {
  lastCompletedDate: null,
  consecutiveFailureCount: 0,
};

export type FeatureFields = {
  // Theater distribution
  openingTheaters: number | null;
  peakTheaters: number | null;
  avgTheaters: number | null;
  minTheaters: number | null;
  theaterStd: number | null;
  expansionRatio: number | null;
  // Revenue momentum
  openingDayGross: number | null;
  peakDailyGross: number | null;
  meanDailyGross: number | null;
  dailyGrossStd: number | null;
  // Per-theater performance
  openingPerTheater: number | null;
  peakPerTheater: number | null;
  meanPerTheater: number | null;
  perTheaterStd: number | null;
  perTheaterSlope: number | null;
  // Day-to-day dynamics
  meanYdChangePct: number | null;
  ydChangeStd: number | null;
  meanLwChangePct: number | null;
  lwChangeStd: number | null;
  maxYdChangePct: number | null;
  minYdChangePct: number | null;
  // Opening window (offsets 0-2)
  opening3DayGross: number | null;
  opening3DayPerTheater: number | null;
  // Weekly aggregates
  week1MeanGross: number | null;
  week2MeanGross: number | null;
  week1MeanTheaters: number | null;
  week2Week1Ratio: number | null;
  // Front-loading
  frontLoadingRatio: number | null;
  // Release tracking
  maxDaysInRelease: number | null;
  lastCumulativeGross: number | null;
};

export type FeatureName = keyof FeatureFields;

export type AggregatedFeatureVector = {
  movieId: string;
  observedDays: number;
  hasWeek2Data: boolean;
} & FeatureFields;
