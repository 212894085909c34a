import { addDays, differenceInCalendarDays, format, isValid, parseISO } from "date-fns";
import type { IsoDate } from "./types";

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function toDate(date: IsoDate): Date {
  return parseISO(date);
}

export function formatIsoDate(date: Date): IsoDate {
  return format(date, "yyyy-MM-dd");
}

/** Strict check: shape and a real calendar day ("2025-02-30" is rejected). */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  const parsed = toDate(value);
  return isValid(parsed) && formatIsoDate(parsed) === value;
}

export function addDaysIso(date: IsoDate, days: number): IsoDate {
  return formatIsoDate(addDays(toDate(date), days));
}

/** Whole calendar days from `from` to `to` (positive when `to` is later). */
export function diffDays(to: IsoDate, from: IsoDate): number {
  return differenceInCalendarDays(toDate(to), toDate(from));
}

export function todayIso(now: Date = new Date()): IsoDate {
  return formatIsoDate(now);
}

/** Day of week, 0 = Sunday … 6 = Saturday. */
export function weekdayOf(date: IsoDate): number {
  return toDate(date).getDay();
}

export function maxDate(a: IsoDate | null, b: IsoDate | null): IsoDate | null {
  if (a == null) return b;
  if (b == null) return a;
  return a >= b ? a : b;
}
