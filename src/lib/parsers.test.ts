import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import {
  layoutFromHeaders,
  parseDailyReportHtml,
  parseInteger,
  parseMoney,
  parsePercent,
  POSITIONAL_LAYOUT,
} from './parsers';

const REPORT_HTML = readFileSync(new URL('./__fixtures__/daily-report.html', import.meta.url), 'utf8');
const PAGE_URL = 'https://reports.test/date/2024-05-03/';

describe('parsers', () => {
  describe('parseMoney', () => {
    it('strips currency symbols and separators', () => {
      expect(parseMoney('$1,234,567')).toBe(1234567);
      expect(parseMoney(' $870 ')).toBe(870);
    });

    it('returns null for dashes, blanks and text', () => {
      expect(parseMoney('-')).toBeNull();
      expect(parseMoney('—')).toBeNull();
      expect(parseMoney('')).toBeNull();
      expect(parseMoney(undefined)).toBeNull();
      expect(parseMoney('about $1M')).toBeNull();
    });
  });

  describe('parsePercent', () => {
    it('keeps the sign', () => {
      expect(parsePercent('+12.5%')).toBe(12.5);
      expect(parsePercent('-45.3%')).toBe(-45.3);
    });

    it('treats n/a as missing', () => {
      expect(parsePercent('n/a')).toBeNull();
    });
  });

  describe('parseInteger', () => {
    it('parses counts with separators and rejects fractions', () => {
      expect(parseInteger('3,000')).toBe(3000);
      expect(parseInteger('2.5')).toBeNull();
    });
  });

  describe('layoutFromHeaders', () => {
    it('maps the published header row onto the positional layout', () => {
      const headers = ['Rank', 'LW', 'Release', 'Daily', '%± YD', '%± LW', 'Theaters', 'Avg', 'To Date', 'Days', 'Distributor'];
      expect(layoutFromHeaders(headers)).toEqual(POSITIONAL_LAYOUT);
    });

    it('follows reordered columns', () => {
      expect(layoutFromHeaders(['Title', 'Gross', 'Theaters'])).toEqual({
        title: 0,
        dailyGross: 1,
        theaterCount: 2,
      });
    });

    it('returns null when no title column is present', () => {
      expect(layoutFromHeaders(['Date', 'Top 10 Gross'])).toBeNull();
    });
  });

  describe('parseDailyReportHtml', () => {
    const parsed = parseDailyReportHtml(REPORT_HTML, '2024-05-03', PAGE_URL);

    it('finds the report table', () => {
      expect(parsed.tableFound).toBe(true);
      expect(parsed.records.map((r) => r.sourceTitle)).toEqual([
        'Harbor Lights',
        'The Quiet Orchard',
        'Paper Comets',
      ]);
    });

    it('extracts every column of a complete row', () => {
      expect(parsed.records[1]).toEqual({
        date: '2024-05-03',
        sourceTitle: 'The Quiet Orchard',
        sourceUrl: 'https://reports.test/release/rl1002/',
        rank: 2,
        dailyGross: 2450500,
        ydChangePct: 12.5,
        lwChangePct: -45.3,
        theaterCount: 2815,
        perTheaterAvg: 870,
        cumulativeGross: 61204118,
        daysInRelease: 9,
        distributor: 'Lantern Films',
      });
    });

    it('keeps rows with missing optional columns as nulls', () => {
      expect(parsed.records[2]).toMatchObject({
        sourceUrl: null,
        dailyGross: 980000,
        ydChangePct: -3.1,
        lwChangePct: null,
        theaterCount: null,
        perTheaterAvg: null,
        cumulativeGross: null,
        daysInRelease: null,
        distributor: null,
      });
    });

    it('drops rows without a title or a usable gross and says why', () => {
      expect(
        parsed.rejected.map((e) => ({ reason: e.reason, row: e.rowIndex, title: e.title })),
      ).toEqual([
        { reason: 'missing_title', row: 3, title: null },
        { reason: 'missing_gross', row: 4, title: 'Glass Meridian' },
        { reason: 'invalid_gross', row: 5, title: 'Salt Roads' },
      ]);
    });

    it('falls back to positions when the table has no header row', () => {
      const html = `<table>
        <tr><td>1</td><td>-</td><td><a href="/release/rl7/">Night Ferry</a></td><td>$4,000</td>
        <td>-</td><td>-</td><td>10</td><td>$400</td><td>$4,000</td><td>1</td><td>Indie Co</td></tr>
      </table>`;
      const result = parseDailyReportHtml(html, '2024-05-03', PAGE_URL);
      expect(result.records).toHaveLength(1);
      expect(result.records[0]).toMatchObject({
        sourceTitle: 'Night Ferry',
        sourceUrl: 'https://reports.test/release/rl7/',
        dailyGross: 4000,
        theaterCount: 10,
        distributor: 'Indie Co',
      });
    });

    it('reports a page without a table', () => {
      expect(parseDailyReportHtml('<html><body>Rate limited</body></html>', '2024-05-03', PAGE_URL)).toEqual({
        tableFound: false,
        records: [],
        rejected: [],
      });
    });

    it('accepts an empty table', () => {
      const result = parseDailyReportHtml('<table><tr><th>Release</th><th>Daily</th></tr></table>', '2024-05-03', PAGE_URL);
      expect(result).toEqual({ tableFound: true, records: [], rejected: [] });
    });
  });
});
