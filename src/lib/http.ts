const DEFAULT_TIMEOUT_MS = 15000;
const MAX_RETRY_ATTEMPTS = 2;
const RETRYABLE_STATUS_CODES = new Set([408, 425, 429, 500, 502, 503, 504]);
const RETRY_BASE_DELAY_MS = 200;
const RETRY_MAX_DELAY_MS = 1200;

export const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

function createAbortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === "AbortError";
}

export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.message === "Request timed out";
}

function isRetryableNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const message = err.message.toLowerCase();
  return (
    message.includes("timed out") ||
    message.includes("fetch failed") ||
    message.includes("network") ||
    message.includes("socket") ||
    message.includes("econnreset") ||
    message.includes("etimedout")
  );
}

/** `Retry-After` as milliseconds (delta-seconds or HTTP date), or null. */
export function parseRetryAfter(header: string | null | undefined, now = Date.now()): number | null {
  if (!header) return null;
  if (/^\d+$/.test(header)) return Number.parseInt(header, 10) * 1000;
  const retryAt = Date.parse(header);
  if (Number.isNaN(retryAt)) return null;
  return Math.max(retryAt - now, 0);
}

export type BackoffPolicy = { baseMs: number; maxMs: number };

/** Exponential delay before retry number `attempt` (1-based), capped at `maxMs`. */
export function backoffDelayMs(
  attempt: number,
  policy: BackoffPolicy,
  retryAfterMs: number | null = null,
): number {
  const exponential = Math.min(policy.baseMs * 2 ** (attempt - 1), policy.maxMs);
  if (retryAfterMs == null) return exponential;
  return Math.min(Math.max(retryAfterMs, exponential), policy.maxMs);
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return;
  if (signal?.aborted) throw createAbortError();

  await new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      reject(createAbortError());
    };

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<Response> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const callerSignal = init.signal;
  const forwardAbort = () => controller.abort();
  callerSignal?.addEventListener("abort", forwardAbort, { once: true });
  try {
    return await fetch(url, {
      ...init,
      signal: controller.signal,
      headers: {
        "user-agent": USER_AGENT,
        ...(init.headers || {}),
      },
    });
  } catch (err) {
    if (isAbortError(err)) {
      if (callerSignal?.aborted) {
        throw err;
      }
      throw new Error("Request timed out");
    }
    throw err;
  } finally {
    clearTimeout(timeout);
    callerSignal?.removeEventListener("abort", forwardAbort);
  }
}

async function requestWithRetries(
  url: string,
  init: RequestInit = {},
  timeoutMs?: number,
): Promise<Response> {
  const policy = { baseMs: RETRY_BASE_DELAY_MS, maxMs: RETRY_MAX_DELAY_MS };

  for (let attempt = 1; attempt <= MAX_RETRY_ATTEMPTS; attempt += 1) {
    try {
      const res = await fetchWithTimeout(url, init, timeoutMs);
      if (res.ok) return res;

      const shouldRetryStatus =
        attempt < MAX_RETRY_ATTEMPTS &&
        RETRYABLE_STATUS_CODES.has(res.status) &&
        !init.signal?.aborted;
      if (!shouldRetryStatus) {
        return res;
      }

      await sleep(
        backoffDelayMs(attempt, policy, parseRetryAfter(res.headers.get("retry-after"))),
        init.signal ?? undefined,
      );
    } catch (err) {
      if (isAbortError(err)) throw err;

      const shouldRetryError =
        attempt < MAX_RETRY_ATTEMPTS &&
        isRetryableNetworkError(err) &&
        !init.signal?.aborted;
      if (!shouldRetryError) {
        throw err;
      }

      await sleep(backoffDelayMs(attempt, policy), init.signal ?? undefined);
    }
  }

  throw new Error("Temporarily unavailable");
}

/** GET a JSON API (catalog lookups). Report pages go through `fetcher.ts`. */
export async function fetchJson<T>(
  url: string,
  init?: RequestInit,
  timeoutMs?: number,
): Promise<T> {
  const res = await requestWithRetries(url, init, timeoutMs);
  if (!res.ok) {
    throw new Error(`Request failed: ${res.status} ${res.statusText}`);
  }
  return (await res.json()) as T;
}

// ─── Rate limiting ────────────────────────────────────────────────────────────

export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => sleep(ms),
};

/**
 * Spaces out request starts by at least `minIntervalMs`, whatever the outcome
 * of the previous request. One limiter per external host.
 */
export class RateLimiter {
  private lastStartedAt: number | null = null;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Waits until the next request may start, then claims the slot. */
  async acquire(extraDelayMs = 0): Promise<void> {
    const now = this.clock.now();
    const earliest =
      this.lastStartedAt == null ? now : this.lastStartedAt + this.minIntervalMs;
    const waitMs = Math.max(earliest - now, extraDelayMs, 0);
    if (waitMs > 0) await this.clock.sleep(waitMs);
    this.lastStartedAt = this.clock.now();
  }
}
