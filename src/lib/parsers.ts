// src/lib/parsers.ts

import * as cheerio from "cheerio";
import { ParseError } from "./errors";
import { canonicalSourceUrl } from "./normalize";
import type { DailyRecord, IsoDate } from "./types";

const EMPTY_CELL = /^(?:-|–|—|n\/a|)$/i;

function cleanNumeric(text: string): string | null {
  const trimmed = text.trim();
  if (EMPTY_CELL.test(trimmed)) return null;
  return trimmed.replace(/[$,%+\s]/g, "");
}

/** "$1,234,567" → 1234567; "-" and blanks → null. */
export function parseMoney(text: string | undefined): number | null {
  if (text == null) return null;
  const cleaned = cleanNumeric(text);
  if (cleaned == null || cleaned === "") return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/** "+12.5%" → 12.5, "-45.3%" → -45.3; "-" and "n/a" → null. */
export function parsePercent(text: string | undefined): number | null {
  return parseMoney(text);
}

/** "3,000" → 3000; non-integers → null. */
export function parseInteger(text: string | undefined): number | null {
  const value = parseMoney(text);
  return value != null && Number.isInteger(value) ? value : null;
}

// ─── Column layout ────────────────────────────────────────────────────────────

type ColumnName =
  | "rank"
  | "title"
  | "dailyGross"
  | "ydChangePct"
  | "lwChangePct"
  | "theaterCount"
  | "perTheaterAvg"
  | "cumulativeGross"
  | "daysInRelease"
  | "distributor";

export type ColumnLayout = Partial<Record<ColumnName, number>>;

/** Layout of the report table as published when no header row can be read. */
export const POSITIONAL_LAYOUT: ColumnLayout = {
  rank: 0,
  title: 2,
  dailyGross: 3,
  ydChangePct: 4,
  lwChangePct: 5,
  theaterCount: 6,
  perTheaterAvg: 7,
  cumulativeGross: 8,
  daysInRelease: 9,
  distributor: 10,
};

// Header text is lowercased with whitespace removed before matching: "%± YD" → "%±yd".
const HEADER_MATCHERS: Array<[ColumnName, (h: string) => boolean]> = [
  ["rank", (h) => h === "rank"],
  ["title", (h) => ["release", "title", "movie", "film"].includes(h)],
  ["dailyGross", (h) => h === "daily" || h === "gross" || h === "dailygross"],
  ["ydChangePct", (h) => h.includes("yd") && (h.includes("%") || h.includes("change"))],
  ["lwChangePct", (h) => h.includes("lw") && (h.includes("%") || h.includes("change"))],
  ["theaterCount", (h) => h.startsWith("theater") || h.startsWith("theatre")],
  ["perTheaterAvg", (h) => h === "avg" || h === "average" || h.startsWith("pertheat")],
  ["cumulativeGross", (h) => h === "todate" || h === "total" || h.startsWith("cumulative")],
  ["daysInRelease", (h) => h === "days" || h === "daysinrelease"],
  ["distributor", (h) => h.startsWith("distributor")],
];

export function layoutFromHeaders(headers: string[]): ColumnLayout | null {
  const layout: ColumnLayout = {};
  headers.forEach((raw, index) => {
    const header = raw.toLowerCase().replace(/\s+/g, "");
    for (const [name, matches] of HEADER_MATCHERS) {
      if (layout[name] === undefined && matches(header)) {
        layout[name] = index;
        break;
      }
    }
  });
  // Without a title column the header is not the report's; use positions instead
  return layout.title === undefined ? null : layout;
}

// ─── Report page ──────────────────────────────────────────────────────────────

export type ParsedReport = {
  /** False when the page has no table at all, which the fetcher treats as a bad response. */
  tableFound: boolean;
  records: DailyRecord[];
  rejected: ParseError[];
};

export function parseDailyReportHtml(
  html: string,
  date: IsoDate,
  baseUrl: string,
): ParsedReport {
  const $ = cheerio.load(html);
  const table = $("table").first();
  if (table.length === 0) {
    return { tableFound: false, records: [], rejected: [] };
  }

  const rows = table.find("tr");
  const headerRow = rows.filter((_, tr) => $(tr).children("th").length > 0).first();
  const headers = headerRow
    .children("th")
    .map((_, th) => $(th).text().trim())
    .get();
  const layout = layoutFromHeaders(headers) ?? POSITIONAL_LAYOUT;

  const records: DailyRecord[] = [];
  const rejected: ParseError[] = [];

  rows
    .filter((_, tr) => $(tr).children("td").length > 0)
    .each((rowIndex, tr) => {
      const cells = $(tr).children("td");
      const cellText = (column: ColumnName): string | undefined => {
        const index = layout[column];
        if (index === undefined || index >= cells.length) return undefined;
        return cells.eq(index).text().trim();
      };

      const title = cellText("title");
      if (!title) {
        rejected.push(new ParseError("missing_title", rowIndex, null));
        return;
      }

      const grossText = cellText("dailyGross");
      if (grossText == null || EMPTY_CELL.test(grossText)) {
        rejected.push(new ParseError("missing_gross", rowIndex, title));
        return;
      }
      const dailyGross = parseMoney(grossText);
      if (dailyGross == null) {
        rejected.push(new ParseError("invalid_gross", rowIndex, title));
        return;
      }

      const titleIndex = layout.title;
      const href =
        titleIndex === undefined ? undefined : cells.eq(titleIndex).find("a").attr("href");

      records.push({
        date,
        sourceTitle: title,
        sourceUrl: href ? canonicalSourceUrl(href, baseUrl) : null,
        rank: parseInteger(cellText("rank")),
        dailyGross,
        ydChangePct: parsePercent(cellText("ydChangePct")),
        lwChangePct: parsePercent(cellText("lwChangePct")),
        theaterCount: parseInteger(cellText("theaterCount")),
        perTheaterAvg: parseMoney(cellText("perTheaterAvg")),
        cumulativeGross: parseMoney(cellText("cumulativeGross")),
        daysInRelease: parseInteger(cellText("daysInRelease")),
        distributor: cellText("distributor") || null,
      });
    });

  return { tableFound: true, records, rejected };
}
