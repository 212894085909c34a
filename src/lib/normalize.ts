import type { DailyRecord } from "./types";

/**
 * Title key used for matching and for records without a source URL.
 * Latin diacritics are folded, then everything that is not a letter or digit
 * in any script goes: "Amélie" → "amelie", "Spider-Man: No Way Home" →
 * "spidermannowayhome", "Сталкер" → "сталкер".
 *
 * An empty result means the title has no usable key.
 */
export function normalizeTitle(title: string): string {
  return title
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .normalize("NFC")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]/gu, "");
}

/**
 * Canonical form of a source URL. Query strings and fragments carry tracking
 * parameters (`?ref_=bo_ds_table_1`) that change between pages, so they are dropped.
 */
export function canonicalSourceUrl(href: string, base?: string): string | null {
  try {
    const url = new URL(href, base);
    url.search = "";
    url.hash = "";
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Identity of a record within its date: source URL, else normalized title,
 * else the trimmed title as printed.
 */
export function recordKey(record: Pick<DailyRecord, "sourceUrl" | "sourceTitle">): string {
  if (record.sourceUrl) return record.sourceUrl;
  const normalized = normalizeTitle(record.sourceTitle);
  if (normalized) return `title:${normalized}`;
  return `raw:${record.sourceTitle.trim()}`;
}
