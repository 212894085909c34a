import { addDaysIso, formatIsoDate, weekdayOf } from "./dates";
import type { IsoDate } from "./types";

/** Picks which calendar dates inside [start, end] get fetched. */
export interface DateStrategy {
  readonly name: string;
  dates(start: IsoDate, end: IsoDate): IsoDate[];
}

export function intervalStrategy(stepDays: number, name = `every-${stepDays}d`): DateStrategy {
  if (!Number.isInteger(stepDays) || stepDays < 1) {
    throw new Error(`Interval must be a positive whole number of days, got ${stepDays}`);
  }
  return {
    name,
    dates(start, end) {
      const out: IsoDate[] = [];
      for (let d = start; d <= end; d = addDaysIso(d, stepDays)) out.push(d);
      return out;
    },
  };
}

export const dailyStrategy: DateStrategy = intervalStrategy(1, "daily");
export const weeklyStrategy: DateStrategy = intervalStrategy(7, "weekly");
export const biweeklyStrategy: DateStrategy = intervalStrategy(14, "biweekly");

const FRIDAY = 5;

function nthWeekday(year: number, month: number, weekday: number, n: number): IsoDate {
  const first = new Date(year, month - 1, 1);
  const shift = (weekday - first.getDay() + 7) % 7;
  return formatIsoDate(new Date(year, month - 1, 1 + shift + (n - 1) * 7));
}

function lastWeekday(year: number, month: number, weekday: number): IsoDate {
  const last = new Date(year, month, 0);
  const shift = (last.getDay() - weekday + 7) % 7;
  return formatIsoDate(new Date(year, month - 1, last.getDate() - shift));
}

/** Major US release holidays for `year`. */
export function releaseHolidays(year: number): IsoDate[] {
  const pad = (n: number) => String(n).padStart(2, "0");
  const fixed = (month: number, day: number) => `${year}-${pad(month)}-${pad(day)}`;
  return [
    fixed(1, 1),
    fixed(2, 14),
    lastWeekday(year, 5, 1), // Memorial Day
    fixed(7, 4),
    nthWeekday(year, 11, 4, 4), // Thanksgiving
    fixed(12, 25),
  ];
}

/** Every Friday (the main release day) plus release holidays. */
export const calendarStrategy: DateStrategy = {
  name: "calendar",
  dates(start, end) {
    const picked = new Set<IsoDate>();
    for (let d = start; d <= end; d = addDaysIso(d, 1)) {
      if (weekdayOf(d) === FRIDAY) picked.add(d);
    }
    const firstYear = Number(start.slice(0, 4));
    const lastYear = Number(end.slice(0, 4));
    for (let year = firstYear; year <= lastYear; year += 1) {
      for (const holiday of releaseHolidays(year)) {
        if (holiday >= start && holiday <= end) picked.add(holiday);
      }
    }
    return [...picked].sort();
  },
};

const NAMED: Record<string, DateStrategy> = {
  daily: dailyStrategy,
  weekly: weeklyStrategy,
  biweekly: biweeklyStrategy,
  calendar: calendarStrategy,
};

/** `daily`, `weekly`, `biweekly`, `calendar`, or `every-<n>d`. */
export function strategyByName(name: string): DateStrategy {
  const named = NAMED[name];
  if (named) return named;
  const custom = /^every-(\d+)d$/.exec(name);
  if (custom) return intervalStrategy(Number(custom[1]));
  throw new Error(
    `Unknown date strategy "${name}" (expected ${Object.keys(NAMED).join(", ")} or every-<n>d)`,
  );
}
