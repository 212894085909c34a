import { z } from "zod";
import { addDaysIso, isIsoDate, todayIso } from "./dates";
import type { IsoDate } from "./types";

export const DEFAULT_REPORT_URL_TEMPLATE = "https://www.boxofficemojo.com/date/{date}/";

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
  POSTGRES_URL: z.string().min(1).optional(),
  REPORT_URL_TEMPLATE: z
    .string()
    .default(DEFAULT_REPORT_URL_TEMPLATE)
    .refine((v) => v.includes("{date}"), "must contain a {date} placeholder"),
  FETCH_MIN_INTERVAL_MS: intFromEnv(2000),
  FETCH_MAX_ATTEMPTS: intFromEnv(3, 1),
  FETCH_BACKOFF_BASE_MS: intFromEnv(1000),
  FETCH_BACKOFF_MAX_MS: intFromEnv(30000),
  FETCH_TIMEOUT_MS: intFromEnv(15000, 1),
  MATCH_WINDOW_DAYS: intFromEnv(14),
  CIRCUIT_BREAKER_THRESHOLD: intFromEnv(10, 1),
  AGGREGATE_CONCURRENCY: intFromEnv(5, 1),
  CATALOG_SOURCE: z.enum(["db", "tmdb"]).default("db"),
  TMDB_API_KEY: z.string().min(1).optional(),
});

export type PipelineConfig = {
  postgresUrl: string | undefined;
  reportUrlTemplate: string;
  fetch: {
    minIntervalMs: number;
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    timeoutMs: number;
  };
  matchWindowDays: number;
  circuitBreakerThreshold: number;
  aggregateConcurrency: number;
  catalogSource: "db" | "tmdb";
  tmdbKey: string | undefined;
};

/** Blank values count as unset so `FOO=` in a .env file falls back to the default. */
function dropBlank(env: Record<string, string | undefined>) {
  return Object.fromEntries(
    Object.entries(env).filter(([, v]) => v != null && v.trim() !== ""),
  );
}

export function getPipelineConfig(env: Record<string, string | undefined>): PipelineConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;
  return {
    postgresUrl: e.POSTGRES_URL,
    reportUrlTemplate: e.REPORT_URL_TEMPLATE,
    fetch: {
      minIntervalMs: e.FETCH_MIN_INTERVAL_MS,
      maxAttempts: e.FETCH_MAX_ATTEMPTS,
      backoffBaseMs: e.FETCH_BACKOFF_BASE_MS,
      backoffMaxMs: e.FETCH_BACKOFF_MAX_MS,
      timeoutMs: e.FETCH_TIMEOUT_MS,
    },
    matchWindowDays: e.MATCH_WINDOW_DAYS,
    circuitBreakerThreshold: e.CIRCUIT_BREAKER_THRESHOLD,
    aggregateConcurrency: e.AGGREGATE_CONCURRENCY,
    catalogSource: e.CATALOG_SOURCE,
    tmdbKey: e.TMDB_API_KEY,
  };
}

// ─── Run presets ──────────────────────────────────────────────────────────────

export type RunPreset = "test" | "quick" | "recent" | "full";

export const RUN_PRESETS: readonly RunPreset[] = ["test", "quick", "recent", "full"];

export type DateRange = { start: IsoDate; end: IsoDate };

export function isRunPreset(value: string): value is RunPreset {
  return (RUN_PRESETS as readonly string[]).includes(value);
}

/** Preset ranges end yesterday: today's report is usually not published yet. */
export function resolvePreset(preset: RunPreset, now: Date = new Date()): DateRange {
  const end = addDaysIso(todayIso(now), -1);
  switch (preset) {
    case "test":
      return { start: end, end };
    case "quick":
      return { start: addDaysIso(end, -30), end };
    case "recent":
      return { start: addDaysIso(end, -182), end };
    case "full":
      return { start: "2024-01-01", end };
  }
}

export function parseDateRange(start: string, end: string): DateRange {
  if (!isIsoDate(start)) throw new Error(`Invalid start date: ${start}`);
  if (!isIsoDate(end)) throw new Error(`Invalid end date: ${end}`);
  if (start > end) throw new Error(`Start date ${start} is after end date ${end}`);
  return { start, end };
}
