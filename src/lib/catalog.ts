import { canonicalSourceUrl, normalizeTitle } from "./normalize";
import type { DailyRecord, MovieIdentity } from "./types";

/** Async boundary to whatever owns canonical movie identities. */
export interface CatalogSource {
  /** `rawTitle` is a display form of the title, for sources that need a search query. */
  listCandidates(normalizedTitle: string, rawTitle?: string): Promise<MovieIdentity[]>;
  byUrl(url: string): Promise<MovieIdentity | null>;
}

/** Synchronous, immutable view of the catalog that `match()` reads. */
export interface CatalogSnapshot {
  listCandidates(normalizedTitle: string): readonly MovieIdentity[];
  byUrl(url: string): MovieIdentity | null;
}

function byMovieId(a: MovieIdentity, b: MovieIdentity): number {
  return a.movieId < b.movieId ? -1 : a.movieId > b.movieId ? 1 : 0;
}

/** Snapshot over a fixed list of identities. */
export class InMemoryCatalog implements CatalogSnapshot {
  private readonly titleIndex = new Map<string, MovieIdentity[]>();
  private readonly urlIndex = new Map<string, MovieIdentity>();
  private readonly idIndex = new Map<string, MovieIdentity>();

  constructor(entries: readonly MovieIdentity[]) {
    const sorted = [...entries].sort(byMovieId);
    for (const entry of sorted) {
      this.idIndex.set(entry.movieId, entry);
      const key = normalizeTitle(entry.canonicalTitle);
      if (key) {
        const bucket = this.titleIndex.get(key);
        if (bucket) bucket.push(entry);
        else this.titleIndex.set(key, [entry]);
      }
      // First (lowest movieId) wins when two entries claim one URL
      const url = entry.sourceUrl ? canonicalSourceUrl(entry.sourceUrl) : null;
      if (url && !this.urlIndex.has(url)) {
        this.urlIndex.set(url, entry);
      }
    }
  }

  get size(): number {
    return this.idIndex.size;
  }

  byId(movieId: string): MovieIdentity | null {
    return this.idIndex.get(movieId) ?? null;
  }

  listCandidates(normalizedTitle: string): readonly MovieIdentity[] {
    return this.titleIndex.get(normalizedTitle) ?? [];
  }

  byUrl(url: string): MovieIdentity | null {
    const canonical = canonicalSourceUrl(url);
    return canonical ? (this.urlIndex.get(canonical) ?? null) : null;
  }
}

/** Async `CatalogSource` view of an in-memory catalog (tests, CSV-seeded runs). */
export function asCatalogSource(catalog: InMemoryCatalog): CatalogSource {
  return {
    listCandidates: async (title) => [...catalog.listCandidates(title)],
    byUrl: async (url) => catalog.byUrl(url),
  };
}

/**
 * Resolve every distinct URL and title of `records` through `source` once and
 * freeze the answers. Lookups run one at a time so remote catalogs see a
 * bounded request rate.
 */
export async function snapshotCatalog(
  source: CatalogSource,
  records: readonly DailyRecord[],
): Promise<InMemoryCatalog> {
  const urls = new Set<string>();
  // normalized title → smallest raw spelling seen, so the query does not depend on record order
  const titles = new Map<string, string>();
  for (const record of records) {
    if (record.sourceUrl) urls.add(record.sourceUrl);
    const key = normalizeTitle(record.sourceTitle);
    if (!key) continue;
    const seen = titles.get(key);
    if (seen === undefined || record.sourceTitle < seen) titles.set(key, record.sourceTitle);
  }

  const found = new Map<string, MovieIdentity>();
  for (const url of [...urls].sort()) {
    const identity = await source.byUrl(url);
    if (identity) found.set(identity.movieId, identity);
  }
  for (const [title, rawTitle] of [...titles].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    for (const identity of await source.listCandidates(title, rawTitle)) {
      if (!found.has(identity.movieId)) found.set(identity.movieId, identity);
    }
  }
  return new InMemoryCatalog([...found.values()]);
}
