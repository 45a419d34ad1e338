import { describe, expect, it } from "vitest";

import {
  parseDate,
  parseDateTime,
  TemporalReason,
  timestampToDateTime,
} from "../../temporal/parse";

describe("parseDate", () => {
  it("parses a calendar date", () => {
    const result = parseDate("0001-12-31");
    expect(result.ok && result.value.toString()).toBe("0001-12-31");
  });

  it.each([
    ["", TemporalReason.TooShort],
    ["2017-01-0", TemporalReason.TooShort],
    ["2017-0a-01", TemporalReason.InvalidCharMonth],
    ["2017-01-a1", TemporalReason.InvalidCharDay],
    ["2017-01_01", TemporalReason.InvalidCharDateSep],
    ["2017-00-01", TemporalReason.OutOfRangeMonth],
    ["2017-04-31", TemporalReason.OutOfRangeDay],
    ["2017-04-00", TemporalReason.OutOfRangeDay],
    ["2017-04-01 ", TemporalReason.ExtraCharacters],
  ])("fails %j with a reason", (text, reason) => {
    expect(parseDate(text)).toEqual({ ok: false, reason });
  });

  it("checks leap years", () => {
    expect(parseDate("2000-02-29").ok).toBe(true);
    expect(parseDate("1900-02-29")).toEqual({
      ok: false,
      reason: TemporalReason.OutOfRangeDay,
    });
  });
});

describe("parseDateTime", () => {
  it("accepts every date/time separator", () => {
    for (const separator of ["T", "t", "_", " "]) {
      const result = parseDateTime(`2017-01-01${separator}08:09`);
      expect(result.ok && result.value.toString()).toBe("2017-01-01T08:09:00");
    }
  });

  it("reads offsets without a colon and in lower case", () => {
    const colonless = parseDateTime("2017-01-01T08:09:10+0130");
    expect(colonless.ok && colonless.value.offsetSeconds).toBe(5400);
    const zulu = parseDateTime("2017-01-01T08:09:10z");
    expect(zulu.ok && zulu.value.offsetSeconds).toBe(0);
  });

  it("needs allowDateOnly to read a bare date", () => {
    expect(parseDateTime("2017-01-01")).toEqual({
      ok: false,
      reason: TemporalReason.TooShort,
    });
    const result = parseDateTime("2017-01-01", { allowDateOnly: true });
    expect(result.ok && result.value.isMidnight()).toBe(true);
  });

  it.each([
    ["2017-01-01T0a:00", TemporalReason.InvalidCharHour],
    ["2017-01-01T00:0a", TemporalReason.InvalidCharMinute],
    ["2017-01-01T00:00:0a", TemporalReason.InvalidCharSecond],
    ["2017-01-01T00:00:0", TemporalReason.TooShort],
    ["2017-01-01T00:00+0a:00", TemporalReason.InvalidCharTzHour],
    ["2017-01-01T00:00+01:0a", TemporalReason.InvalidCharTzMinute],
    ["2017-01-01T00:00+01:60", TemporalReason.InvalidCharTzMinute],
    ["2017-13-01T00:00", TemporalReason.OutOfRangeMonth],
  ])("fails %j with a reason", (text, reason) => {
    expect(parseDateTime(text)).toEqual({ ok: false, reason });
  });
});

describe("timestampToDateTime", () => {
  it("reads small magnitudes as seconds", () => {
    const result = timestampToDateTime(0);
    expect(result.ok && result.value.toString()).toBe("1970-01-01T00:00:00Z");
  });

  it("reads large magnitudes as milliseconds", () => {
    const result = timestampToDateTime(1_500_000_000_123);
    expect(result.ok && result.value.toString()).toBe(
      "2017-07-14T02:40:00.123000Z"
    );
  });

  it("handles negative timestamps", () => {
    const result = timestampToDateTime(-1);
    expect(result.ok && result.value.toString()).toBe("1969-12-31T23:59:59Z");
  });

  it("fails beyond year 9999", () => {
    expect(timestampToDateTime(1e15)).toEqual({
      ok: false,
      reason: TemporalReason.OutOfRangeTimestamp,
    });
    expect(timestampToDateTime(Number.NaN)).toEqual({
      ok: false,
      reason: TemporalReason.OutOfRangeTimestamp,
    });
  });
});
