import { describe, it, expect } from "vitest";
import { dailyRecord, movie } from "./__fixtures__/records";
import { InMemoryCatalog } from "./catalog";
import { estimatedReleaseDate, match } from "./matcher";

describe("estimatedReleaseDate", () => {
  it("subtracts days in release from the report date", () => {
    expect(estimatedReleaseDate(dailyRecord({ date: "2025-01-05", daysInRelease: 1 }))).toBe("2025-01-04");
  });

  it("falls back to the report date", () => {
    expect(estimatedReleaseDate(dailyRecord({ date: "2025-01-05", daysInRelease: null }))).toBe("2025-01-05");
  });
});

describe("match", () => {
  const url = "https://reports.test/release/rl1/";

  it("matches exactly on source URL, whatever the title says", () => {
    const catalog = new InMemoryCatalog([movie("m-1", "Harbor Lights (2024)", "2024-05-03", url)]);
    expect(match(dailyRecord({ sourceUrl: url, sourceTitle: "Harbour Lights" }), catalog)).toEqual({
      recordKey: url,
      date: "2024-05-03",
      movieId: "m-1",
      confidence: "exact",
      method: "source_url",
      ambiguous: false,
      candidateCount: 1,
    });
  });

  it("falls back to the title when the URL is unknown", () => {
    const catalog = new InMemoryCatalog([movie("m-1", "Harbor Lights", "2024-05-02")]);
    expect(match(dailyRecord({ sourceUrl: url }), catalog)).toMatchObject({
      movieId: "m-1",
      confidence: "fuzzy",
      method: "title_window",
    });
  });

  it("filters by the release window before breaking ties", () => {
    const catalog = new InMemoryCatalog([
      movie("m-jun", "Echo Valley", "2025-06-10"),
      movie("m-jan", "Echo Valley", "2025-01-03"),
    ]);
    const record = dailyRecord({ date: "2025-01-05", daysInRelease: 1, sourceTitle: "ECHO VALLEY" });
    expect(match(record, catalog)).toEqual({
      recordKey: "title:echovalley",
      date: "2025-01-05",
      movieId: "m-jan",
      confidence: "fuzzy",
      method: "title_window",
      ambiguous: false,
      candidateCount: 1,
    });
  });

  it("breaks ties between in-window candidates by distance", () => {
    const catalog = new InMemoryCatalog([
      movie("m-a", "Echo Valley", "2025-01-01"),
      movie("m-b", "Echo Valley", "2025-01-06"),
    ]);
    const record = dailyRecord({ date: "2025-01-05", daysInRelease: 1, sourceTitle: "Echo Valley" });
    expect(match(record, catalog)).toMatchObject({
      movieId: "m-b",
      method: "title_tiebreak",
      ambiguous: true,
      candidateCount: 2,
    });
  });

  it("prefers the earlier release at equal distance, then the lower id", () => {
    const record = dailyRecord({ date: "2025-01-05", daysInRelease: 1, sourceTitle: "Echo Valley" });
    const spread = new InMemoryCatalog([
      movie("m-late", "Echo Valley", "2025-01-06"),
      movie("m-early", "Echo Valley", "2025-01-02"),
    ]);
    expect(match(record, spread).movieId).toBe("m-early");

    const same = new InMemoryCatalog([
      movie("m-2", "Echo Valley", "2025-01-04"),
      movie("m-1", "Echo Valley", "2025-01-04"),
    ]);
    expect(match(record, same).movieId).toBe("m-1");
  });

  it("is deterministic whatever the catalog order", () => {
    const entries = [
      movie("m-c", "Echo Valley", "2025-01-02"),
      movie("m-a", "Echo Valley", "2025-01-06"),
      movie("m-b", "Echo Valley", "2025-01-04"),
    ];
    const record = dailyRecord({ date: "2025-01-05", daysInRelease: 1, sourceTitle: "Echo Valley" });
    const forward = match(record, new InMemoryCatalog(entries));
    const backward = match(record, new InMemoryCatalog([...entries].reverse()));
    expect(forward).toEqual(backward);
    expect(forward.movieId).toBe("m-b");
  });

  it("leaves records unmatched outside the window", () => {
    const catalog = new InMemoryCatalog([movie("m-1", "Harbor Lights", "2024-03-01")]);
    expect(match(dailyRecord(), catalog)).toMatchObject({
      movieId: null,
      confidence: "unmatched",
      method: "none",
      candidateCount: 0,
    });
  });

  it("widens or narrows with the window option", () => {
    const catalog = new InMemoryCatalog([movie("m-1", "Harbor Lights", "2024-04-22")]);
    // estimate is 2024-05-02, ten days after the catalog date
    expect(match(dailyRecord(), catalog).movieId).toBe("m-1");
    expect(match(dailyRecord(), catalog, { windowDays: 7 }).movieId).toBeNull();
  });

  it("matches non-Latin titles only to the same title", () => {
    const catalog = new InMemoryCatalog([
      movie("m-kimetsu", "鬼滅の刃", "2024-05-02"),
      movie("m-stalker", "Сталкер", "2024-05-02"),
    ]);
    expect(match(dailyRecord({ sourceTitle: "СТАЛКЕР" }), catalog)).toMatchObject({
      movieId: "m-stalker",
      method: "title_window",
      candidateCount: 1,
    });
    expect(match(dailyRecord({ sourceTitle: "千と千尋の神隠し" }), catalog).movieId).toBeNull();
  });

  it("never matches on a title without letters or digits", () => {
    const catalog = new InMemoryCatalog([movie("m-1", "???", "2024-05-02"), movie("m-2", "!!!", "2024-05-02")]);
    expect(match(dailyRecord({ sourceTitle: "..." }), catalog)).toMatchObject({
      recordKey: "raw:...",
      movieId: null,
      confidence: "unmatched",
    });
  });

  it("never matches a candidate without a release date by title", () => {
    const catalog = new InMemoryCatalog([movie("m-1", "Harbor Lights", null)]);
    expect(match(dailyRecord(), catalog).confidence).toBe("unmatched");
  });
});
