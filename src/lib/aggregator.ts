import { diffDays } from "./dates";
import { recordKey } from "./normalize";
import type { AggregatedFeatureVector, DailyRecord, IsoDate } from "./types";

/**
 * Early-trajectory features for one movie.
 *
 * Records are placed on a day-offset axis (0 = release day, or the first
 * observed day when the release date is unknown). Span statistics use every
 * record; window features (opening 0-2, week1 0-6, week2 7-13) require every
 * offset of their window and are null otherwise. Nothing is interpolated.
 */

const OPENING_WINDOW: readonly [number, number] = [0, 2];
const WEEK1_WINDOW: readonly [number, number] = [0, 6];
const WEEK2_WINDOW: readonly [number, number] = [7, 13];
const MIN_SLOPE_POINTS = 3;

// ─── Statistics (null-skipping) ───────────────────────────────────────────────

type Maybe = number | null | undefined;

function present(values: readonly Maybe[]): number[] {
  const out: number[] = [];
  for (const v of values) if (v != null && Number.isFinite(v)) out.push(v);
  return out;
}

export function mean(values: readonly Maybe[]): number | null {
  const xs = present(values);
  if (xs.length === 0) return null;
  let sum = 0;
  for (const x of xs) sum += x;
  return sum / xs.length;
}

/** Sample standard deviation (n - 1); needs two values. */
export function sampleStd(values: readonly Maybe[]): number | null {
  const xs = present(values);
  if (xs.length < 2) return null;
  const m = mean(xs) ?? 0;
  let ss = 0;
  for (const x of xs) ss += (x - m) ** 2;
  return Math.sqrt(ss / (xs.length - 1));
}

export function max(values: readonly Maybe[]): number | null {
  const xs = present(values);
  return xs.length === 0 ? null : Math.max(...xs);
}

export function min(values: readonly Maybe[]): number | null {
  const xs = present(values);
  return xs.length === 0 ? null : Math.min(...xs);
}

/** Ordinary least-squares slope of y on x; null below three points or with no spread in x. */
export function linearSlope(points: ReadonlyArray<readonly [number, number]>): number | null {
  if (points.length < MIN_SLOPE_POINTS) return null;
  const mx = points.reduce((s, [x]) => s + x, 0) / points.length;
  const my = points.reduce((s, [, y]) => s + y, 0) / points.length;
  let sxy = 0;
  let sxx = 0;
  for (const [x, y] of points) {
    sxy += (x - mx) * (y - my);
    sxx += (x - mx) ** 2;
  }
  return sxx === 0 ? null : sxy / sxx;
}

function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator == null || denominator == null || denominator === 0) return null;
  return numerator / denominator;
}

// ─── Record helpers ───────────────────────────────────────────────────────────

/** Reported per-theater average, else gross / theaters when both are known. */
export function perTheater(record: DailyRecord): number | null {
  if (record.perTheaterAvg != null) return record.perTheaterAvg;
  if (record.theaterCount != null && record.theaterCount > 0) {
    return record.dailyGross / record.theaterCount;
  }
  return null;
}

/**
 * Sort by date and keep one record per date. Two records for one movie on the
 * same day (a re-listing under a second URL) resolve to the larger gross,
 * then the smaller key, so the choice does not depend on input order.
 */
function oneRecordPerDay(records: readonly DailyRecord[]): DailyRecord[] {
  const byDate = new Map<IsoDate, DailyRecord>();
  for (const record of records) {
    const current = byDate.get(record.date);
    if (
      !current ||
      record.dailyGross > current.dailyGross ||
      (record.dailyGross === current.dailyGross && recordKey(record) < recordKey(current))
    ) {
      byDate.set(record.date, record);
    }
  }
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

function windowRecords(
  byOffset: ReadonlyMap<number, DailyRecord>,
  [from, to]: readonly [number, number],
): DailyRecord[] | null {
  const out: DailyRecord[] = [];
  for (let offset = from; offset <= to; offset += 1) {
    const record = byOffset.get(offset);
    if (!record) return null;
    out.push(record);
  }
  return out;
}

// ─── Aggregate ────────────────────────────────────────────────────────────────

export function aggregate(
  movieId: string,
  orderedRecords: readonly DailyRecord[],
  releaseDate: IsoDate | null = null,
): AggregatedFeatureVector {
  const records = oneRecordPerDay(orderedRecords);
  const origin = releaseDate ?? records[0]?.date ?? null;

  const byOffset = new Map<number, DailyRecord>();
  const perTheaterPoints: Array<[number, number]> = [];
  for (const record of records) {
    const offset = origin == null ? 0 : diffDays(record.date, origin);
    if (offset >= 0) byOffset.set(offset, record);
    const pta = perTheater(record);
    if (pta != null) perTheaterPoints.push([offset, pta]);
  }

  const theaters = records.map((r) => r.theaterCount);
  const grosses = records.map((r) => r.dailyGross);
  const perTheaters = records.map(perTheater);
  const ydChanges = records.map((r) => r.ydChangePct);
  const lwChanges = records.map((r) => r.lwChangePct);

  const opening = byOffset.get(0) ?? null;
  const openingTheaters = opening?.theaterCount ?? null;
  const peakTheaters = max(theaters);

  const openingWindow = windowRecords(byOffset, OPENING_WINDOW);
  const opening3DayGross = openingWindow ? openingWindow.reduce((s, r) => s + r.dailyGross, 0) : null;
  const openingTheaterCounts = openingWindow?.map((r) => r.theaterCount) ?? [];
  const opening3DayPerTheater =
    openingWindow && openingTheaterCounts.every((t) => t != null)
      ? ratio(opening3DayGross, mean(openingTheaterCounts))
      : null;

  const week1 = windowRecords(byOffset, WEEK1_WINDOW);
  const week2 = windowRecords(byOffset, WEEK2_WINDOW);
  const week1MeanGross = week1 ? mean(week1.map((r) => r.dailyGross)) : null;
  const week2MeanGross = week2 ? mean(week2.map((r) => r.dailyGross)) : null;

  const last = records.length > 0 ? records[records.length - 1] : null;
  const lastCumulativeGross = last?.cumulativeGross ?? null;
  const frontLoadingRatio =
    week1 && lastCumulativeGross != null && lastCumulativeGross > 0
      ? ratio(opening3DayGross, lastCumulativeGross)
      : null;

  return {
    movieId,
    observedDays: records.length,
    hasWeek2Data: week2 != null,

    openingTheaters,
    peakTheaters,
    avgTheaters: mean(theaters),
    minTheaters: min(theaters),
    theaterStd: sampleStd(theaters),
    expansionRatio: ratio(peakTheaters, openingTheaters),

    openingDayGross: opening?.dailyGross ?? null,
    peakDailyGross: max(grosses),
    meanDailyGross: mean(grosses),
    dailyGrossStd: sampleStd(grosses),

    openingPerTheater: opening ? perTheater(opening) : null,
    peakPerTheater: max(perTheaters),
    meanPerTheater: mean(perTheaters),
    perTheaterStd: sampleStd(perTheaters),
    perTheaterSlope: linearSlope(perTheaterPoints),

    meanYdChangePct: mean(ydChanges),
    ydChangeStd: sampleStd(ydChanges),
    meanLwChangePct: mean(lwChanges),
    lwChangeStd: sampleStd(lwChanges),
    maxYdChangePct: max(ydChanges),
    minYdChangePct: min(ydChanges),

    opening3DayGross,
    opening3DayPerTheater,

    week1MeanGross,
    week2MeanGross,
    week1MeanTheaters: week1 ? mean(week1.map((r) => r.theaterCount)) : null,
    week2Week1Ratio: week2MeanGross == null ? null : ratio(week2MeanGross, week1MeanGross),

    frontLoadingRatio,

    maxDaysInRelease: max(records.map((r) => r.daysInRelease)),
    lastCumulativeGross,
  };
}
