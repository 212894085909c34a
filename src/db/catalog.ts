import { asc, eq } from "drizzle-orm";
import type { CatalogSource } from "@/lib/catalog";
import { log } from "@/lib/logger";
import { canonicalSourceUrl, normalizeTitle } from "@/lib/normalize";
import type { MovieIdentity } from "@/lib/types";
import type { Database } from "./client";
import { movies } from "./schema";
import type { MovieRow, NewMovieRow } from "./schema";

export function identityToRow(identity: MovieIdentity, tmdbId: number | null = null): NewMovieRow {
  return {
    movieId: identity.movieId,
    canonicalTitle: identity.canonicalTitle,
    normalizedTitle: normalizeTitle(identity.canonicalTitle),
    sourceUrl: identity.sourceUrl ? canonicalSourceUrl(identity.sourceUrl) : null,
    releaseDate: identity.releaseDate,
    tmdbId,
  };
}

function rowToIdentity(row: MovieRow): MovieIdentity {
  return {
    movieId: row.movieId,
    canonicalTitle: row.canonicalTitle,
    sourceUrl: row.sourceUrl,
    releaseDate: row.releaseDate,
  };
}

/** Catalog backed by the `movies` table. */
export class PgCatalog implements CatalogSource {
  constructor(private readonly db: Database) {}

  async listCandidates(normalizedTitle: string): Promise<MovieIdentity[]> {
    if (!normalizedTitle) return [];
    const rows = await this.db
      .select()
      .from(movies)
      .where(eq(movies.normalizedTitle, normalizedTitle))
      .orderBy(asc(movies.movieId));
    return rows.map(rowToIdentity);
  }

  async byUrl(url: string): Promise<MovieIdentity | null> {
    const canonical = canonicalSourceUrl(url);
    if (!canonical) return null;
    const rows = await this.db
      .select()
      .from(movies)
      .where(eq(movies.sourceUrl, canonical))
      .orderBy(asc(movies.movieId))
      .limit(1);
    return rows[0] ? rowToIdentity(rows[0]) : null;
  }

  /** Insert or refresh catalog entries; returns the number written. */
  async upsert(rows: readonly NewMovieRow[]): Promise<number> {
    if (rows.length === 0) return 0;
    await this.db.transaction(async (tx) => {
      for (const row of rows) {
        await tx
          .insert(movies)
          .values(row)
          .onConflictDoUpdate({
            target: movies.movieId,
            set: {
              canonicalTitle: row.canonicalTitle,
              normalizedTitle: row.normalizedTitle,
              sourceUrl: row.sourceUrl,
              releaseDate: row.releaseDate,
              tmdbId: row.tmdbId,
            },
          });
      }
    });
    log.info("catalog_upserted", { count: rows.length });
    return rows.length;
  }
}
