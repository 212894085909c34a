import { Redis } from '@upstash/redis';
import { diffDays, isIsoDate, todayIso } from './dates';
import { log } from './logger';
import type { MovieIdentity } from './types';

// ─── TTL computation (pure) ──────────────────────────────────────────────────

const ONE_DAY_SEC = 24 * 60 * 60;
const THIRTY_DAYS_SEC = 30 * 24 * 60 * 60;
const RECENT_RELEASE_DAYS = 365;

/**
 * Candidate lists for recent titles change as the catalog fills in (new
 * entries, corrected release dates), so they expire after a day. Lists whose
 * newest candidate is over a year old are stable and keep for 30 days.
 */
export function computeCandidateTtl(
  candidates: readonly MovieIdentity[],
  now: Date = new Date(),
): number {
  const today = todayIso(now);
  const releaseDates = candidates
    .map((c) => c.releaseDate)
    .filter((d): d is string => d != null && isIsoDate(d));
  if (releaseDates.length === 0) return ONE_DAY_SEC;
  const newest = releaseDates.reduce((a, b) => (a > b ? a : b));
  return diffDays(today, newest) > RECENT_RELEASE_DAYS ? THIRTY_DAYS_SEC : ONE_DAY_SEC;
}

// ─── Redis client (lazy singleton) ───────────────────────────────────────────

let redisClient: Redis | null | undefined; // undefined = not initialized

function getRedisClient(): Redis | null {
  if (redisClient !== undefined) return redisClient;

  const url = process.env.KV_REST_API_URL ?? process.env.UPSTASH_REDIS_REST_URL;
  const token = process.env.KV_REST_API_TOKEN ?? process.env.UPSTASH_REDIS_REST_TOKEN;

  if (!url || !token) {
    log.info('kv_disabled', { reason: 'Missing Redis env vars' });
    redisClient = null;
    return null;
  }

  try {
    redisClient = new Redis({ url, token });
    log.info('kv_enabled');
    return redisClient;
  } catch (err) {
    log.warn('kv_init_failed', { error: (err as Error).message });
    redisClient = null;
    return null;
  }
}

// ─── Public API (gracefully degrading) ───────────────────────────────────────

// Bump when MovieIdentity shape changes to auto-invalidate stale cache entries
const KV_SCHEMA_VERSION = 1;

type CachedCandidates = { _v: number; candidates: MovieIdentity[] };

function kvKey(source: string, normalizedTitle: string): string {
  return `catalog:${source}:${normalizedTitle}`;
}

export async function kvGetCandidates(
  source: string,
  normalizedTitle: string,
): Promise<MovieIdentity[] | null> {
  try {
    const client = getRedisClient();
    if (!client) return null;
    const data = await client.get<CachedCandidates>(kvKey(source, normalizedTitle));
    if (data && data._v === KV_SCHEMA_VERSION) {
      log.debug('kv_hit', { source, title: normalizedTitle });
      return data.candidates;
    }
    return null;
  } catch (err) {
    log.warn('kv_get_failed', { source, title: normalizedTitle, error: (err as Error).message });
    return null;
  }
}

export async function kvSetCandidates(
  source: string,
  normalizedTitle: string,
  candidates: MovieIdentity[],
): Promise<void> {
  try {
    const client = getRedisClient();
    if (!client) return;
    const ttl = computeCandidateTtl(candidates);
    const cached: CachedCandidates = { _v: KV_SCHEMA_VERSION, candidates };
    await client.set(kvKey(source, normalizedTitle), cached, { ex: ttl });
    log.debug('kv_set', { source, title: normalizedTitle, ttlSec: ttl });
  } catch (err) {
    log.warn('kv_set_failed', { source, title: normalizedTitle, error: (err as Error).message });
  }
}

export function _resetKvClient(): void {
  redisClient = undefined;
}
