import {
  formatTimeOfDay,
  isValidDateString,
  isValidTimeZone,
  normalizeTimeOfDay,
  parseId,
  parseOutcome,
  parseTimeOfDay,
  parseYearMonth,
  toLocalDateTime,
  validateScheduleInput,
} from "../validation";
import { addDays, diffDays, monthBounds, spanDays } from "../calendar";

describe("time of day", () => {
  test("padded and unpadded hours parse to the same minute", () => {
    expect(parseTimeOfDay("09:05")).toBe(545);
    expect(parseTimeOfDay("9:05")).toBe(545);
  });

  test("out-of-range values are rejected", () => {
    expect(parseTimeOfDay("24:00")).toBeNull();
    expect(parseTimeOfDay("12:60")).toBeNull();
    expect(parseTimeOfDay("noon")).toBeNull();
    expect(parseTimeOfDay(900)).toBeNull();
  });

  test("normalizes to HH:MM", () => {
    expect(normalizeTimeOfDay(" 7:30 ")).toBe("07:30");
    expect(formatTimeOfDay(0)).toBe("00:00");
    expect(formatTimeOfDay(23 * 60 + 59)).toBe("23:59");
  });
});

describe("dates", () => {
  test("isValidDateString rejects impossible calendar dates", () => {
    expect(isValidDateString("2026-02-28")).toBe(true);
    expect(isValidDateString("2026-02-30")).toBe(false);
    expect(isValidDateString("2026-2-3")).toBe(false);
    expect(isValidDateString(undefined)).toBe(false);
  });

  test("parseYearMonth", () => {
    expect(parseYearMonth("2026-04")).toEqual({ year: 2026, month: 4 });
    expect(parseYearMonth("2026-13")).toBeNull();
  });

  test("calendar arithmetic crosses month and year boundaries", () => {
    expect(addDays("2026-02-28", 1)).toBe("2026-03-01");
    expect(addDays("2026-01-01", -1)).toBe("2025-12-31");
    expect(diffDays("2026-03-01", "2026-03-10")).toBe(9);
    expect(spanDays("2026-03-01", "2026-03-10")).toBe(10);
    expect(spanDays("2026-03-10", "2026-03-01")).toBe(0);
    expect(monthBounds(2024, 2)).toEqual({ start: "2024-02-01", end: "2024-02-29" });
  });
});

describe("toLocalDateTime", () => {
  test("UTC midnight is minute 0", () => {
    expect(toLocalDateTime(new Date("2026-03-10T00:00:00Z"), "UTC")).toEqual({ date: "2026-03-10", minutes: 0 });
  });

  test("zone ahead of UTC rolls the local date forward", () => {
    expect(toLocalDateTime(new Date("2026-03-10T23:30:00Z"), "Asia/Tokyo")).toEqual({ date: "2026-03-11", minutes: 510 });
  });

  test("daylight saving offset is applied", () => {
    // New York is on EDT (UTC-4) after 2026-03-08.
    expect(toLocalDateTime(new Date("2026-03-10T13:00:00Z"), "America/New_York")).toEqual({ date: "2026-03-10", minutes: 540 });
  });

  test("isValidTimeZone", () => {
    expect(isValidTimeZone("Europe/Berlin")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
    expect(isValidTimeZone("")).toBe(false);
  });
});

describe("boundary parsing", () => {
  test("outcome is a closed set", () => {
    expect(parseOutcome("completed")).toBe("completed");
    expect(parseOutcome("skipped")).toBe("skipped");
    expect(parseOutcome("yes")).toBeNull();
  });

  test("parseId accepts positive integers only", () => {
    expect(parseId("12")).toBe(12);
    expect(parseId("0")).toBeNull();
    expect(parseId("1.5")).toBeNull();
    expect(parseId("2147483647")).toBe(2147483647);
    expect(parseId("3000000000")).toBeNull();
  });

  test("validateScheduleInput reports each bad field", () => {
    const result = validateScheduleInput({ time: "25:00", timezone: "Nowhere/City" });
    expect(result.ok).toBe(false);
    expect(result.errors).toEqual([
      'time: expected HH:MM, got "25:00"',
      'timezone: unknown time zone "Nowhere/City"',
    ]);
  });
});
