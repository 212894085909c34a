import { describe, it, expect } from "vitest";
import { addDaysIso, diffDays, isIsoDate, maxDate, todayIso, weekdayOf } from "./dates";

describe("dates", () => {
  it("validates real calendar days only", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2025-02-29")).toBe(false);
    expect(isIsoDate("2025-1-05")).toBe(false);
    expect(isIsoDate("2025-01-05T00:00:00")).toBe(false);
  });

  it("adds days across month and year boundaries", () => {
    expect(addDaysIso("2024-12-30", 3)).toBe("2025-01-02");
    expect(addDaysIso("2024-03-01", -1)).toBe("2024-02-29");
  });

  it("counts calendar days between dates", () => {
    expect(diffDays("2024-05-10", "2024-05-03")).toBe(7);
    expect(diffDays("2024-05-03", "2024-05-10")).toBe(-7);
    expect(diffDays("2024-11-04", "2024-11-01")).toBe(3);
  });

  it("formats today in local time", () => {
    expect(todayIso(new Date(2025, 0, 9, 23, 59))).toBe("2025-01-09");
  });

  it("reports the weekday", () => {
    expect(weekdayOf("2024-05-03")).toBe(5);
    expect(weekdayOf("2024-05-05")).toBe(0);
  });

  it("picks the later of two optional dates", () => {
    expect(maxDate(null, "2024-01-02")).toBe("2024-01-02");
    expect(maxDate("2024-01-03", null)).toBe("2024-01-03");
    expect(maxDate("2024-01-03", "2024-01-02")).toBe("2024-01-03");
    expect(maxDate(null, null)).toBeNull();
  });
});
