/**
 * Fixed-grammar ISO 8601 parsers for dates and datetimes.
 *
 *   date     = YYYY "-" MM "-" DD
 *   datetime = date ("T" / "t" / "_" / " ") HH ":" MM [":" SS ["." 1*DIGIT]] [offset]
 *   offset   = "Z" / "z" / ("+" / "-") HH [":"] MM
 *
 * Fraction digits beyond the sixth are truncated. A bare date is only read as
 * a datetime when `allowDateOnly` is set.
 */

import { CalendarDate, DateTimeValue, daysInMonth } from "../core/values";

export type TemporalResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

export const TemporalReason = {
  TooShort: "input is too short",
  ExtraCharacters: "unexpected extra characters at the end of the input",
  InvalidCharYear: "invalid character in year",
  InvalidCharDateSep: "invalid date separator, expected `-`",
  InvalidCharMonth: "invalid character in month",
  InvalidCharDay: "invalid character in day",
  OutOfRangeMonth: "month value is outside expected range of 1-12",
  OutOfRangeDay: "day value is outside expected range",
  InvalidCharDateTimeSep:
    "invalid datetime separator, expected `T`, `t`, `_` or space",
  InvalidCharHour: "invalid character in hour",
  InvalidCharTimeSep: "invalid time separator, expected `:`",
  InvalidCharMinute: "invalid character in minute",
  InvalidCharSecond: "invalid character in second",
  InvalidCharSecondFraction: "invalid character in second fraction",
  OutOfRangeHour: "hour value is outside expected range of 0-23",
  OutOfRangeMinute: "minute value is outside expected range of 0-59",
  OutOfRangeSecond: "second value is outside expected range of 0-59",
  InvalidCharTzSign: "invalid timezone sign",
  InvalidCharTzHour: "invalid timezone hour",
  InvalidCharTzMinute: "invalid timezone minute",
  OutOfRangeTz: "timezone offset must be less than 24 hours",
  OutOfRangeTimestamp: "timestamp value is outside expected range",
} as const;

const DATE_LENGTH = 10;
const MAX_FRACTION_DIGITS = 6;
const MS_TIMESTAMP_THRESHOLD = 2e10;
const DATETIME_SEPARATORS = new Set(["T", "t", "_", " "]);

type TemporalFailure = { ok: false; reason: string };

function fail(reason: string): TemporalFailure {
  return { ok: false, reason };
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= "0" && char <= "9";
}

function readDigits(
  text: string,
  start: number,
  count: number
): number | undefined {
  let value = 0;
  for (let i = start; i < start + count; i++) {
    const char = text[i];
    if (!isDigit(char)) {
      return;
    }
    value = value * 10 + Number(char);
  }
  return value;
}

function parseDatePrefix(text: string): TemporalResult<CalendarDate> {
  if (text.length < DATE_LENGTH) {
    return fail(TemporalReason.TooShort);
  }
  const year = readDigits(text, 0, 4);
  if (year === undefined) {
    return fail(TemporalReason.InvalidCharYear);
  }
  if (text[4] !== "-") {
    return fail(TemporalReason.InvalidCharDateSep);
  }
  const month = readDigits(text, 5, 2);
  if (month === undefined) {
    return fail(TemporalReason.InvalidCharMonth);
  }
  if (text[7] !== "-") {
    return fail(TemporalReason.InvalidCharDateSep);
  }
  const day = readDigits(text, 8, 2);
  if (day === undefined) {
    return fail(TemporalReason.InvalidCharDay);
  }
  if (month < 1 || month > 12) {
    return fail(TemporalReason.OutOfRangeMonth);
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return fail(TemporalReason.OutOfRangeDay);
  }
  return { ok: true, value: new CalendarDate(year, month, day) };
}

export function parseDate(text: string): TemporalResult<CalendarDate> {
  const result = parseDatePrefix(text);
  if (result.ok && text.length > DATE_LENGTH) {
    return fail(TemporalReason.ExtraCharacters);
  }
  return result;
}

type TimeFields = {
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
  offsetSeconds: number | null;
};

function parseFraction(
  text: string,
  start: number
): { microsecond: number; end: number } | undefined {
  let end = start;
  while (isDigit(text[end])) {
    end++;
  }
  if (end === start) {
    return;
  }
  const digits = text
    .slice(start, Math.min(end, start + MAX_FRACTION_DIGITS))
    .padEnd(MAX_FRACTION_DIGITS, "0");
  return { microsecond: Number(digits), end };
}

function parseOffset(
  text: string,
  start: number
): TemporalResult<{ offsetSeconds: number | null; end: number }> {
  const sign = text[start];
  if (sign === undefined) {
    return { ok: true, value: { offsetSeconds: null, end: start } };
  }
  if (sign === "Z" || sign === "z") {
    return { ok: true, value: { offsetSeconds: 0, end: start + 1 } };
  }
  if (sign !== "+" && sign !== "-") {
    return fail(TemporalReason.InvalidCharTzSign);
  }
  const hours = readDigits(text, start + 1, 2);
  if (hours === undefined) {
    return fail(TemporalReason.InvalidCharTzHour);
  }
  let pos = start + 3;
  if (text[pos] === ":") {
    pos++;
  }
  const minutes = readDigits(text, pos, 2);
  if (minutes === undefined) {
    return fail(TemporalReason.InvalidCharTzMinute);
  }
  if (hours > 23) {
    return fail(TemporalReason.OutOfRangeTz);
  }
  if (minutes > 59) {
    return fail(TemporalReason.InvalidCharTzMinute);
  }
  const magnitude = hours * 3600 + minutes * 60;
  return {
    ok: true,
    value: {
      offsetSeconds: sign === "-" ? -magnitude : magnitude,
      end: pos + 2,
    },
  };
}

function parseTime(text: string, start: number): TemporalResult<TimeFields> {
  if (text.length < start + 5) {
    return fail(TemporalReason.TooShort);
  }
  const hour = readDigits(text, start, 2);
  if (hour === undefined) {
    return fail(TemporalReason.InvalidCharHour);
  }
  if (hour > 23) {
    return fail(TemporalReason.OutOfRangeHour);
  }
  if (text[start + 2] !== ":") {
    return fail(TemporalReason.InvalidCharTimeSep);
  }
  const minute = readDigits(text, start + 3, 2);
  if (minute === undefined) {
    return fail(TemporalReason.InvalidCharMinute);
  }
  if (minute > 59) {
    return fail(TemporalReason.OutOfRangeMinute);
  }

  let pos = start + 5;
  let second = 0;
  let microsecond = 0;
  if (text[pos] === ":") {
    if (text.length < pos + 3) {
      return fail(TemporalReason.TooShort);
    }
    const parsedSecond = readDigits(text, pos + 1, 2);
    if (parsedSecond === undefined) {
      return fail(TemporalReason.InvalidCharSecond);
    }
    if (parsedSecond > 59) {
      return fail(TemporalReason.OutOfRangeSecond);
    }
    second = parsedSecond;
    pos += 3;
    if (text[pos] === ".") {
      const fraction = parseFraction(text, pos + 1);
      if (!fraction) {
        return fail(TemporalReason.InvalidCharSecondFraction);
      }
      microsecond = fraction.microsecond;
      pos = fraction.end;
    }
  }

  const offset = parseOffset(text, pos);
  if (!offset.ok) {
    return offset;
  }
  if (offset.value.end < text.length) {
    return fail(TemporalReason.ExtraCharacters);
  }
  return {
    ok: true,
    value: {
      hour,
      minute,
      second,
      microsecond,
      offsetSeconds: offset.value.offsetSeconds,
    },
  };
}

export type DateTimeParseOptions = {
  /** Read a bare `YYYY-MM-DD` as midnight */
  allowDateOnly?: boolean;
};

export function parseDateTime(
  text: string,
  options: DateTimeParseOptions = {}
): TemporalResult<DateTimeValue> {
  const date = parseDatePrefix(text);
  if (!date.ok) {
    return date;
  }
  const { year, month, day } = date.value;
  if (text.length === DATE_LENGTH) {
    return options.allowDateOnly
      ? { ok: true, value: new DateTimeValue({ year, month, day }) }
      : fail(TemporalReason.TooShort);
  }
  if (!DATETIME_SEPARATORS.has(text.charAt(DATE_LENGTH))) {
    return fail(TemporalReason.InvalidCharDateTimeSep);
  }
  const time = parseTime(text, DATE_LENGTH + 1);
  if (!time.ok) {
    return time;
  }
  return {
    ok: true,
    value: new DateTimeValue({ year, month, day, ...time.value }),
  };
}

/**
 * Converts a unix timestamp to a UTC datetime. Magnitudes above 2e10 are read
 * as milliseconds, smaller ones as seconds.
 */
export function timestampToDateTime(
  timestamp: number
): TemporalResult<DateTimeValue> {
  if (!Number.isFinite(timestamp)) {
    return fail(TemporalReason.OutOfRangeTimestamp);
  }
  const millis =
    Math.abs(timestamp) > MS_TIMESTAMP_THRESHOLD ? timestamp : timestamp * 1000;
  const totalMicros = Math.round(millis * 1000);
  const wholeMillis = Math.floor(totalMicros / 1000);
  const date = new Date(wholeMillis);
  const year = date.getUTCFullYear();
  if (Number.isNaN(date.getTime()) || year < 0 || year > 9999) {
    return fail(TemporalReason.OutOfRangeTimestamp);
  }
  return {
    ok: true,
    value: new DateTimeValue({
      year,
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hour: date.getUTCHours(),
      minute: date.getUTCMinutes(),
      second: date.getUTCSeconds(),
      microsecond:
        date.getUTCMilliseconds() * 1000 + (totalMicros - wholeMillis * 1000),
      offsetSeconds: 0,
    }),
  };
}
