import { describe, expect, it } from "vitest";

import {
  CalendarDate,
  DateTimeValue,
  daysInMonth,
  isLeapYear,
} from "../../core/values";

describe("CalendarDate", () => {
  it("formats with zero padding", () => {
    expect(new CalendarDate(7, 3, 9).toString()).toBe("0007-03-09");
    expect(JSON.stringify({ at: new CalendarDate(2020, 1, 2) })).toBe(
      '{"at":"2020-01-02"}'
    );
  });

  it("compares by value", () => {
    const a = new CalendarDate(2020, 1, 2);
    expect(a.equals(new CalendarDate(2020, 1, 2))).toBe(true);
    expect(a.compare(new CalendarDate(2020, 2, 1))).toBeLessThan(0);
    expect(a.compare(new CalendarDate(2019, 12, 31))).toBeGreaterThan(0);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(new CalendarDate(2020, 1, 2))).toBe(true);
  });
});

describe("DateTimeValue", () => {
  it("defaults the time to midnight and the offset to naive", () => {
    const value = new DateTimeValue({ year: 2020, month: 1, day: 2 });
    expect(value.isMidnight()).toBe(true);
    expect(value.offsetSeconds).toBeNull();
    expect(value.toString()).toBe("2020-01-02T00:00:00");
  });

  it("formats negative offsets", () => {
    const value = new DateTimeValue({
      year: 2020,
      month: 1,
      day: 2,
      hour: 3,
      microsecond: 42,
      offsetSeconds: -(5 * 3600 + 30 * 60),
    });
    expect(value.toString()).toBe("2020-01-02T03:00:00.000042-05:30");
  });

  it("converts to a JS date in UTC", () => {
    const value = new DateTimeValue({
      year: 2020,
      month: 1,
      day: 2,
      hour: 3,
      offsetSeconds: 3600,
    });
    expect(value.toDate().toISOString()).toBe("2020-01-02T02:00:00.000Z");
  });

  it("keeps two-digit years when converting", () => {
    const value = new DateTimeValue({ year: 45, month: 6, day: 7 });
    expect(value.toDate().getUTCFullYear()).toBe(45);
  });

  it("round-trips through fromDate", () => {
    const date = new Date(Date.UTC(2001, 1, 3, 4, 5, 6, 7));
    expect(DateTimeValue.fromDate(date).toDate().getTime()).toBe(
      date.getTime()
    );
  });
});

describe("calendar helpers", () => {
  it("knows month lengths", () => {
    expect(isLeapYear(2024)).toBe(true);
    expect(isLeapYear(2100)).toBe(false);
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2023, 11)).toBe(30);
    expect(daysInMonth(2023, 12)).toBe(31);
  });
});
