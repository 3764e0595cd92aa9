import { describe, expect, it } from "vitest";
import {
  addDaysToDateKey,
  dateAtTimeInTimeZoneIso,
  formatTimeSlot,
  isValidDateKey,
  isValidTime,
  isValidTimeZone,
  normalizeInstant,
  overlap,
  parsePositiveInt,
  toDateKeyInTimeZone,
  utcDateKeysBetween,
} from "./core";

describe("normalizeInstant", () => {
  it("converts offsets to UTC", () => {
    expect(normalizeInstant("2024-06-03T09:00:00+02:00")).toBe("2024-06-03T07:00:00.000Z");
  });

  it("rejects unparseable and non-string input", () => {
    expect(normalizeInstant("next tuesday-ish")).toBeNull();
    expect(normalizeInstant(42)).toBeNull();
    expect(normalizeInstant(undefined)).toBeNull();
  });

  it("rejects date-times without a zone designator", () => {
    expect(normalizeInstant("2024-06-03T09:00")).toBeNull();
    expect(normalizeInstant("2024-06-03T09:00:00.000")).toBeNull();
    expect(normalizeInstant("2024-06-03")).toBeNull();
    expect(normalizeInstant("2024-06-03T09:00Z")).toBe("2024-06-03T09:00:00.000Z");
    expect(normalizeInstant("2024-06-03T09:00:00-04:00")).toBe("2024-06-03T13:00:00.000Z");
  });
});

describe("overlap", () => {
  it("treats ranges as half-open", () => {
    expect(
      overlap(
        "2024-06-03T09:00:00.000Z",
        "2024-06-03T09:30:00.000Z",
        "2024-06-03T09:30:00.000Z",
        "2024-06-03T10:00:00.000Z",
      ),
    ).toBe(false);
    expect(
      overlap(
        "2024-06-03T09:00:00.000Z",
        "2024-06-03T09:30:00.000Z",
        "2024-06-03T09:15:00.000Z",
        "2024-06-03T09:45:00.000Z",
      ),
    ).toBe(true);
  });
});

describe("date keys and times", () => {
  it("validates calendar dates and clock times", () => {
    expect(isValidDateKey("2024-02-29")).toBe(true);
    expect(isValidDateKey("2024-02-30")).toBe(false);
    expect(isValidDateKey("2024-6-3")).toBe(false);
    expect(isValidTime("23:59")).toBe(true);
    expect(isValidTime("24:00")).toBe(false);
  });

  it("adds days across month ends", () => {
    expect(addDaysToDateKey("2024-02-28", 2)).toBe("2024-03-01");
  });

  it("lists every UTC day a range touches", () => {
    expect(utcDateKeysBetween("2024-06-03T22:00:00.000Z", "2024-06-04T01:00:00.000Z")).toEqual([
      "2024-06-03",
      "2024-06-04",
    ]);
    expect(utcDateKeysBetween("2024-06-03T22:00:00.000Z", "2024-06-04T00:00:00.000Z")).toEqual([
      "2024-06-03",
    ]);
  });
});

describe("time zones", () => {
  it("resolves a local wall-clock time to an instant", () => {
    expect(dateAtTimeInTimeZoneIso("2024-06-03", "09:00", "Europe/Berlin")).toBe(
      "2024-06-03T07:00:00.000Z",
    );
    expect(dateAtTimeInTimeZoneIso("2024-01-15", "09:00", "Europe/Berlin")).toBe(
      "2024-01-15T08:00:00.000Z",
    );
  });

  it("resolves wall times around a daylight-saving change", () => {
    expect(dateAtTimeInTimeZoneIso("2025-03-09", "01:00", "America/New_York")).toBe(
      "2025-03-09T06:00:00.000Z",
    );
    expect(dateAtTimeInTimeZoneIso("2025-03-09", "04:00", "America/New_York")).toBe(
      "2025-03-09T08:00:00.000Z",
    );
    // 02:30 does not exist on this date.
    expect(dateAtTimeInTimeZoneIso("2025-03-09", "02:30", "America/New_York")).toBe(
      "2025-03-09T07:30:00.000Z",
    );
    expect(dateAtTimeInTimeZoneIso("2025-11-02", "01:30", "America/New_York")).toBe(
      "2025-11-02T05:30:00.000Z",
    );
  });

  it("finds the local date of an instant", () => {
    expect(toDateKeyInTimeZone("2024-06-03T23:30:00.000Z", "Asia/Tokyo")).toBe("2024-06-04");
    expect(toDateKeyInTimeZone("2024-06-03T23:30:00.000Z", "UTC")).toBe("2024-06-03");
  });

  it("recognises IANA zone names", () => {
    expect(isValidTimeZone("America/New_York")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
  });
});

describe("formatTimeSlot", () => {
  it("renders a 12-hour range in the zone", () => {
    expect(formatTimeSlot("2024-06-03T09:00:00.000Z", "2024-06-03T09:30:00.000Z", "UTC")).toBe(
      "09:00 AM - 09:30 AM",
    );
    expect(
      formatTimeSlot("2024-06-03T11:30:00.000Z", "2024-06-03T13:00:00.000Z", "Europe/Berlin"),
    ).toBe("01:30 PM - 03:00 PM");
  });
});

describe("parsePositiveInt", () => {
  it("falls back and clamps", () => {
    expect(parsePositiveInt("abc", 5, 10)).toBe(5);
    expect(parsePositiveInt("-2", 5, 10)).toBe(5);
    expect(parsePositiveInt("25", 5, 10)).toBe(10);
    expect(parsePositiveInt("3.7", 5, 10)).toBe(3);
  });
});
