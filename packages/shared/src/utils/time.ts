import { TimeParsingError } from "../errors";

// YYYY-MM-DD, optionally followed by [T ]HH:MM[:SS[.fff]] and a Z / ±HH[:MM] suffix.
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?\s*(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

// Compact form written into calendar files: 20250601T143500Z.
const BASIC_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z)?$/i;

function toInt(value: string | undefined): number {
  return value ? Number.parseInt(value, 10) : 0;
}

function daysInMonth(year: number, month: number): number {
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

function parseOffsetMinutes(raw: string | undefined): number | null {
  if (!raw || raw.toUpperCase() === "Z") return 0;
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  const hours = toInt(digits.slice(0, 2));
  const minutes = toInt(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return null;
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 timestamp into a UTC instant.
 *
 * Timestamps without an offset are taken as UTC (CLIST returns naive UTC times).
 * Fractional seconds are dropped, since calendar DATE-TIME values carry whole
 * seconds only. Throws TimeParsingError for anything else.
 */
export function parseIsoTimestamp(input: string): Date {
  let value = input.trim();
  const basic = BASIC_PATTERN.exec(value);
  if (basic) {
    const [, y, mo, d, h, mi, s, zone] = basic;
    value = `${y}-${mo}-${d}T${h}:${mi}:${s}${zone ?? ""}`;
  }
  const match = ISO_PATTERN.exec(value);
  if (!match) throw new TimeParsingError(input);

  const year = toInt(match[1]);
  const month = toInt(match[2]);
  const day = toInt(match[3]);
  const hour = toInt(match[4]);
  const minute = toInt(match[5]);
  const second = toInt(match[6]);
  const offsetMinutes = parseOffsetMinutes(match[8]);

  if (
    month < 1 ||
    month > 12 ||
    day < 1 ||
    day > daysInMonth(year, month) ||
    hour > 23 ||
    minute > 59 ||
    second > 59 ||
    offsetMinutes === null
  ) {
    throw new TimeParsingError(input);
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return new Date(date.getTime() - offsetMinutes * 60_000);
}

export function isValidIsoTimestamp(input: string): boolean {
  try {
    parseIsoTimestamp(input);
    return true;
  } catch (err) {
    if (err instanceof TimeParsingError) return false;
    throw err;
  }
}

/** Format for CLIST query parameters (`start__gte` and friends). */
export function toApiTime(value: Date): string {
  return value.toISOString();
}

export function addSeconds(value: Date, seconds: number): Date {
  return new Date(value.getTime() + seconds * 1000);
}
