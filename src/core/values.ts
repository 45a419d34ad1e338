/**
 * Typed output values for the temporal schemas.
 *
 * JS `Date` carries neither a date-only form nor sub-millisecond precision,
 * so dates and datetimes are modelled as small immutable value objects.
 */

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

export class CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    this.year = year;
    this.month = month;
    this.day = day;
    Object.freeze(this);
  }

  equals(other: CalendarDate): boolean {
    return (
      this.year === other.year &&
      this.month === other.month &&
      this.day === other.day
    );
  }

  compare(other: CalendarDate): number {
    return (
      this.year - other.year ||
      this.month - other.month ||
      this.day - other.day
    );
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export type DateTimeFields = {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  microsecond?: number;
  /** Offset from UTC in seconds; `null` for a naive datetime */
  offsetSeconds?: number | null;
};

export class DateTimeValue {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly microsecond: number;
  readonly offsetSeconds: number | null;

  constructor(fields: DateTimeFields) {
    this.year = fields.year;
    this.month = fields.month;
    this.day = fields.day;
    this.hour = fields.hour ?? 0;
    this.minute = fields.minute ?? 0;
    this.second = fields.second ?? 0;
    this.microsecond = fields.microsecond ?? 0;
    this.offsetSeconds = fields.offsetSeconds ?? null;
    Object.freeze(this);
  }

  /**
   * Reads the UTC fields of a JS `Date`; the result carries a zero offset.
   */
  static fromDate(date: Date): DateTimeValue {
    return new DateTimeValue({
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hour: date.getUTCHours(),
      minute: date.getUTCMinutes(),
      second: date.getUTCSeconds(),
      microsecond: date.getUTCMilliseconds() * 1000,
      offsetSeconds: 0,
    });
  }

  date(): CalendarDate {
    return new CalendarDate(this.year, this.month, this.day);
  }

  isMidnight(): boolean {
    return (
      this.hour === 0 &&
      this.minute === 0 &&
      this.second === 0 &&
      this.microsecond === 0
    );
  }

  /**
   * Naive datetimes are read as UTC. Precision drops to milliseconds.
   */
  toDate(): Date {
    const utcMillis = Date.UTC(
      this.year,
      this.month - 1,
      this.day,
      this.hour,
      this.minute,
      this.second,
      Math.floor(this.microsecond / 1000)
    );
    const date = new Date(utcMillis - (this.offsetSeconds ?? 0) * 1000);
    // Date.UTC maps years 0-99 onto 1900-1999
    if (this.year < 100) {
      date.setUTCFullYear(date.getUTCFullYear() - 1900);
    }
    return date;
  }

  equals(other: DateTimeValue): boolean {
    return (
      this.year === other.year &&
      this.month === other.month &&
      this.day === other.day &&
      this.hour === other.hour &&
      this.minute === other.minute &&
      this.second === other.second &&
      this.microsecond === other.microsecond &&
      this.offsetSeconds === other.offsetSeconds
    );
  }

  toString(): string {
    let text = `${this.date().toString()}T${pad(this.hour, 2)}:${pad(
      this.minute,
      2
    )}:${pad(this.second, 2)}`;
    if (this.microsecond !== 0) {
      text += `.${pad(this.microsecond, 6)}`;
    }
    if (this.offsetSeconds === null) {
      return text;
    }
    if (this.offsetSeconds === 0) {
      return `${text}Z`;
    }
    const sign = this.offsetSeconds < 0 ? "-" : "+";
    const total = Math.abs(this.offsetSeconds);
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    return `${text}${sign}${pad(hours, 2)}:${pad(minutes, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
