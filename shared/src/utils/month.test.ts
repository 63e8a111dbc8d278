import { describe, expect, it } from "vitest";
import {
  addMonth,
  firstDayOfMonth,
  formatDate,
  isValidDate,
  monthBounds,
  parseMonthParam,
} from "./month";

const today = new Date(2025, 6, 15); // 2025-07-15 local time

describe("parseMonthParam", () => {
  it("accepts YYYY-MM", () => {
    expect(parseMonthParam("2024-03", today)).toBe("2024-03");
  });

  it("pads a single digit month", () => {
    expect(parseMonthParam("2024-3", today)).toBe("2024-03");
  });

  it("falls back to the current month when missing", () => {
    expect(parseMonthParam(undefined, today)).toBe("2025-07");
    expect(parseMonthParam("", today)).toBe("2025-07");
  });

  it("falls back to the current month when malformed", () => {
    expect(parseMonthParam("2024-13", today)).toBe("2025-07");
    expect(parseMonthParam("2024-05-10", today)).toBe("2025-07");
    expect(parseMonthParam("march", today)).toBe("2025-07");
  });
});

describe("addMonth", () => {
  it("moves forward across the year end", () => {
    expect(addMonth("2024-12", 1)).toBe("2025-01");
  });

  it("moves backward across the year start", () => {
    expect(addMonth("2024-01", -1)).toBe("2023-12");
    expect(addMonth("2024-03", -15)).toBe("2022-12");
  });

  it("returns the same month for zero", () => {
    expect(addMonth("2024-06", 0)).toBe("2024-06");
  });
});

describe("monthBounds", () => {
  it("returns a half-open range ending on the next month's first day", () => {
    expect(monthBounds("2024-02")).toEqual({ start: "2024-02-01", end: "2024-03-01" });
    expect(monthBounds("2024-12")).toEqual({ start: "2024-12-01", end: "2025-01-01" });
  });
});

describe("firstDayOfMonth", () => {
  it("normalizes months and dates to the first day", () => {
    expect(firstDayOfMonth("2024-05")).toBe("2024-05-01");
    expect(firstDayOfMonth("2024-05-20")).toBe("2024-05-01");
  });

  it("rejects anything else", () => {
    expect(firstDayOfMonth("2024-00")).toBeNull();
    expect(firstDayOfMonth("2024-02-30")).toBeNull();
    expect(firstDayOfMonth("May 2024")).toBeNull();
  });
});

describe("dates", () => {
  it("formats a local date", () => {
    expect(formatDate(today)).toBe("2025-07-15");
  });

  it("validates calendar dates", () => {
    expect(isValidDate("2024-02-29")).toBe(true);
    expect(isValidDate("2023-02-29")).toBe(false);
    expect(isValidDate("2024-2-1")).toBe(false);
  });
});
