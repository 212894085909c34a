import { addDaysIso } from "../dates";
import type { DailyRecord, IsoDate, MovieIdentity } from "../types";

export function dailyRecord(overrides: Partial<DailyRecord> = {}): DailyRecord {
  return {
    date: "2024-05-03",
    sourceTitle: "Harbor Lights",
    sourceUrl: null,
    rank: 1,
    dailyGross: 1_000_000,
    ydChangePct: null,
    lwChangePct: null,
    theaterCount: 1000,
    perTheaterAvg: null,
    cumulativeGross: null,
    daysInRelease: 1,
    distributor: "Northwind Pictures",
    ...overrides,
  };
}

/** One record per day from `release`, grosses in order, cumulative filled in. */
export function run(
  release: IsoDate,
  grosses: readonly number[],
  overrides: Partial<DailyRecord> = {},
): DailyRecord[] {
  let cumulative = 0;
  return grosses.map((dailyGross, offset) => {
    cumulative += dailyGross;
    return dailyRecord({
      date: addDaysIso(release, offset),
      dailyGross,
      cumulativeGross: cumulative,
      daysInRelease: offset + 1,
      ...overrides,
    });
  });
}

export function movie(movieId: string, canonicalTitle: string, releaseDate: IsoDate | null, sourceUrl: string | null = null): MovieIdentity {
  return { movieId, canonicalTitle, sourceUrl, releaseDate };
}
