import { FetchError } from "./errors";
import type { FetchFailureReason, ParseError } from "./errors";
import {
  backoffDelayMs,
  fetchWithTimeout,
  isTimeoutError,
  parseRetryAfter,
  RateLimiter,
  systemClock,
} from "./http";
import type { Clock } from "./http";
import { log } from "./logger";
import { parseDailyReportHtml } from "./parsers";
import type { DailyRecord, IsoDate } from "./types";

export type FetcherOptions = {
  urlTemplate: string;
  minIntervalMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeoutMs: number;
  clock?: Clock;
};

export type FetchOutcome =
  | { ok: true; date: IsoDate; records: DailyRecord[]; rejected: ParseError[]; attempts: number }
  | { ok: false; date: IsoDate; error: FetchError };

export type ReportFetcher = {
  fetchAndParse: (date: IsoDate) => Promise<FetchOutcome>;
};

export function reportUrl(template: string, date: IsoDate): string {
  return template.replaceAll("{date}", date);
}

type AttemptFailure = {
  reason: FetchFailureReason;
  message: string;
  status: number | null;
  retryAfterMs: number | null;
};

/**
 * Report-page fetcher. Requests are strictly sequential and every attempt,
 * retries included, goes through one shared rate limiter. Failures never
 * throw: after the last attempt the date comes back as a `FetchError`.
 */
export function createReportFetcher(options: FetcherOptions): ReportFetcher {
  const clock = options.clock ?? systemClock;
  const limiter = new RateLimiter(options.minIntervalMs, clock);
  const policy = { baseMs: options.backoffBaseMs, maxMs: options.backoffMaxMs };

  async function attempt(url: string, date: IsoDate) {
    let res: Response;
    let html = "";
    try {
      res = await fetchWithTimeout(url, {}, options.timeoutMs);
      if (res.ok) html = await res.text();
    } catch (err) {
      const failure: AttemptFailure = {
        reason: isTimeoutError(err) ? "timeout" : "network",
        message: (err as Error).message,
        status: null,
        retryAfterMs: null,
      };
      return failure;
    }

    if (!res.ok) {
      const failure: AttemptFailure = {
        reason: "http_status",
        message: `Request failed: ${res.status} ${res.statusText}`,
        status: res.status,
        retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
      };
      return failure;
    }

    const parsed = parseDailyReportHtml(html, date, url);
    if (!parsed.tableFound) {
      const failure: AttemptFailure = {
        reason: "malformed_response",
        message: "No report table in response",
        status: res.status,
        retryAfterMs: null,
      };
      return failure;
    }
    return parsed;
  }

  async function fetchAndParse(date: IsoDate): Promise<FetchOutcome> {
    const url = reportUrl(options.urlTemplate, date);
    let lastFailure: AttemptFailure | null = null;

    for (let attemptNo = 1; attemptNo <= options.maxAttempts; attemptNo += 1) {
      const delay = lastFailure
        ? backoffDelayMs(attemptNo - 1, policy, lastFailure.retryAfterMs)
        : 0;
      await limiter.acquire(delay);

      const result = await attempt(url, date);
      if ("tableFound" in result) {
        for (const rejection of result.rejected) {
          log.warn("parse_row_dropped", {
            date,
            reason: rejection.reason,
            row: rejection.rowIndex,
            title: rejection.title,
          });
        }
        log.info("fetch_ok", {
          date,
          records: result.records.length,
          dropped: result.rejected.length,
          attempts: attemptNo,
        });
        return {
          ok: true,
          date,
          records: result.records,
          rejected: result.rejected,
          attempts: attemptNo,
        };
      }

      lastFailure = result;
      if (attemptNo < options.maxAttempts) {
        log.warn("fetch_retry", {
          date,
          attempt: attemptNo,
          reason: result.reason,
          status: result.status,
          error: result.message,
        });
      }
    }

    const failure = lastFailure ?? {
      reason: "network" as const,
      message: "No attempts made",
      status: null,
      retryAfterMs: null,
    };
    const error = new FetchError(
      date,
      failure.reason,
      options.maxAttempts,
      failure.message,
      failure.status,
    );
    log.warn("fetch_failed", {
      date,
      reason: error.reason,
      attempts: error.attempts,
      status: error.status,
      error: error.message,
    });
    return { ok: false, date, error };
  }

  return { fetchAndParse };
}
