const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})([T ])(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not. */
function utcDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, ms = 0): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month, day);
  date.setUTCHours(hour, minute, second, ms);
  return date;
}

/**
 * Survey `date` attribute value.
 *
 * Keeps the textual details (separator, fraction digits, offset spelling) so that
 * a parsed timestamp is written back exactly as it was read.
 */
export class VendorTimestamp {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Fraction of a second as written, without the dot ("" when absent) */
  readonly fraction: string;
  readonly separator: 'T' | ' ';
  /** Offset as written ("Z", "+02:00", "-0500"), "" for naive times */
  readonly offset: string;

  private constructor(parts: {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    fraction: string;
    separator: 'T' | ' ';
    offset: string;
  }) {
    this.year = parts.year;
    this.month = parts.month;
    this.day = parts.day;
    this.hour = parts.hour;
    this.minute = parts.minute;
    this.second = parts.second;
    this.fraction = parts.fraction;
    this.separator = parts.separator;
    this.offset = parts.offset;
    Object.freeze(this);
  }

  static parse(raw: string): VendorTimestamp | null {
    const m = TIMESTAMP_PATTERN.exec(raw.trim());
    if (!m) return null;
    const [, y, mo, d, sep, h, mi, s, frac, off] = m;
    if (!y || !mo || !d || !h || !mi || !s) return null;
    const ts = new VendorTimestamp({
      year: Number.parseInt(y, 10),
      month: Number.parseInt(mo, 10),
      day: Number.parseInt(d, 10),
      hour: Number.parseInt(h, 10),
      minute: Number.parseInt(mi, 10),
      second: Number.parseInt(s, 10),
      fraction: frac ?? '',
      separator: sep === ' ' ? ' ' : 'T',
      offset: off ?? '',
    });
    return ts.isCalendarValid() ? ts : null;
  }

  static fromDate(date: Date): VendorTimestamp {
    return new VendorTimestamp({
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hour: date.getUTCHours(),
      minute: date.getUTCMinutes(),
      second: date.getUTCSeconds(),
      fraction: pad(date.getUTCMilliseconds(), 3),
      separator: 'T',
      offset: 'Z',
    });
  }

  private isCalendarValid(): boolean {
    if (this.month < 1 || this.month > 12) return false;
    if (this.hour > 23 || this.minute > 59 || this.second > 59) return false;
    const daysInMonth = utcDate(this.year, this.month, 0).getUTCDate();
    return this.day >= 1 && this.day <= daysInMonth;
  }

  private offsetMinutes(): number {
    if (this.offset === '' || this.offset === 'Z') return 0;
    const sign = this.offset.startsWith('-') ? -1 : 1;
    const digits = this.offset.slice(1).replace(':', '');
    const hours = Number.parseInt(digits.slice(0, 2), 10);
    const minutes = Number.parseInt(digits.slice(2, 4), 10);
    return sign * (hours * 60 + minutes);
  }

  /**
   * Instant represented by this timestamp. Naive times are read as UTC.
   * Fractions finer than a millisecond are truncated.
   */
  toDate(): Date {
    const millis = this.fraction === '' ? 0 : Number.parseInt(this.fraction.padEnd(3, '0').slice(0, 3), 10);
    const local = utcDate(this.year, this.month - 1, this.day, this.hour, this.minute, this.second, millis);
    return new Date(local.getTime() - this.offsetMinutes() * 60_000);
  }

  equals(other: VendorTimestamp): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    const date = `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
    const time = `${pad(this.hour, 2)}:${pad(this.minute, 2)}:${pad(this.second, 2)}`;
    const fraction = this.fraction === '' ? '' : `.${this.fraction}`;
    return `${date}${this.separator}${time}${fraction}${this.offset}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
