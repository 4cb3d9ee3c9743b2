export const DAY_MS = 24 * 60 * 60 * 1000;

const NAIVE_DATETIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

function utcFromParts(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  ms = 0,
): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms));
  // Date.UTC rolls 2022-02-30 over into March; treat that as invalid
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    return null;
  }
  return date;
}

/**
 * Parse a date or datetime string into a UTC instant. Strings without a zone
 * designator are read as UTC; strings carrying `Z` or an offset keep it.
 * Returns null for anything unparseable.
 */
export function parseUtc(input: string): Date | null {
  const s = input.trim();
  const naive = NAIVE_DATETIME.exec(s);
  if (naive) {
    const [, y, mo, d, h, mi, sec, frac] = naive;
    return utcFromParts(
      Number(y),
      Number(mo),
      Number(d),
      h === undefined ? 0 : Number(h),
      mi === undefined ? 0 : Number(mi),
      sec === undefined ? 0 : Number(sec),
      frac === undefined ? 0 : Number(frac.padEnd(3, "0")),
    );
  }
  const compact = COMPACT_DATE.exec(s);
  if (compact) {
    const [, y, mo, d] = compact;
    return utcFromParts(Number(y), Number(mo), Number(d));
  }
  if (!/[zZ]|[+-]\d{2}:?\d{2}$/.test(s)) return null;
  const date = new Date(s);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Normalize a caller-supplied instant to a UTC `Date`, rejecting invalid input. */
export function toUtcInstant(value: Date | string): Date {
  const date = typeof value === "string" ? parseUtc(value) : new Date(value.getTime());
  if (date === null || Number.isNaN(date.getTime())) {
    throw new RangeError(`Invalid date: ${String(value)}`);
  }
  return date;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** `YYYY-MM-DD` of the instant's UTC calendar day. */
export function toDayKey(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** `YYYYMMDD` of the instant's UTC calendar day. */
export function toCompactDay(date: Date): string {
  return toDayKey(date).replaceAll("-", "");
}

export function dayKeyToDate(key: string): Date {
  const date = parseUtc(key);
  if (date === null) throw new RangeError(`Invalid day key: ${key}`);
  return date;
}

export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/** Midnight of `dayKey` in an exchange at `utcOffsetHours`, as a UTC instant. */
export function exchangeMidnightUtc(dayKey: string, utcOffsetHours: number): Date {
  return new Date(dayKeyToDate(dayKey).getTime() - utcOffsetHours * 60 * 60 * 1000);
}

/** `YYYY-MM-DD HH:MM:SS.mmm+00`, the literal form DuckDB reads as TIMESTAMPTZ. */
export function toSqlTimestamp(date: Date): string {
  return (
    `${toDayKey(date)} ${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:` +
    `${pad(date.getUTCSeconds())}.${pad(date.getUTCMilliseconds(), 3)}+00`
  );
}
