import type { CatalogSource } from './catalog';
import { isIsoDate } from './dates';
import { fetchJson } from './http';
import { kvGetCandidates, kvSetCandidates } from './kv';
import { log } from './logger';
import { normalizeTitle } from './normalize';
import type { MovieIdentity } from './types';

type TmdbSearchResult = {
  id: number;
  title: string;
  original_title?: string;
  release_date?: string;
  popularity?: number;
};

const TMDB_BASE = 'https://api.themoviedb.org/3';
const KV_SOURCE = 'tmdb';

export async function searchTmdbTitle(query: string, apiKey: string, signal?: AbortSignal) {
  const data = await fetchJson<{ results?: TmdbSearchResult[] }>(
    `${TMDB_BASE}/search/movie?api_key=${apiKey}&query=${encodeURIComponent(query)}`,
    { signal },
  );
  return data.results ?? [];
}

export function tmdbResultToIdentity(result: TmdbSearchResult): MovieIdentity {
  const releaseDate = result.release_date && isIsoDate(result.release_date) ? result.release_date : null;
  return {
    movieId: `tmdb:${result.id}`,
    canonicalTitle: result.title,
    sourceUrl: null,
    releaseDate,
  };
}

/**
 * TMDB title search as a catalog. TMDB knows nothing about report URLs, so
 * `byUrl` never matches and everything goes through title + release window.
 */
export class TmdbCatalog implements CatalogSource {
  constructor(private readonly apiKey: string) {}

  async listCandidates(normalizedTitle: string, rawTitle?: string): Promise<MovieIdentity[]> {
    if (!normalizedTitle) return [];
    const cached = await kvGetCandidates(KV_SOURCE, normalizedTitle);
    if (cached) return cached;

    const results = await searchTmdbTitle(rawTitle ?? normalizedTitle, this.apiKey);
    const candidates = results
      .filter((r) => normalizeTitle(r.title) === normalizedTitle)
      .map(tmdbResultToIdentity)
      .sort((a, b) => (a.movieId < b.movieId ? -1 : a.movieId > b.movieId ? 1 : 0));

    log.debug('tmdb_candidates', { title: normalizedTitle, results: results.length, kept: candidates.length });
    await kvSetCandidates(KV_SOURCE, normalizedTitle, candidates);
    return candidates;
  }

  async byUrl(): Promise<MovieIdentity | null> {
    return null;
  }
}
