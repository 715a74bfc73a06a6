/**
 * Date utilities for front-matter values and feeds
 */

/**
 * Format a Date as YYYY-MM-DD string (ISO date without time)
 *
 * @example
 * toISODateString(new Date("2025-01-15T10:30:00Z")) // "2025-01-15"
 */
export function toISODateString(date: Date): string {
  const isoString = date.toISOString();
  return isoString.substring(0, isoString.indexOf("T"));
}

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse an ISO 8601 date or date-time. Values without a zone are UTC.
 */
function parseISODate(value: string): Date | null {
  const match = ISO_DATE_TIME.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, millis, zone] = match;
  const parts = [year, month, day, hour, minute, second].map((part) =>
    Number(part ?? 0),
  );
  const [y = 0, mo = 1, d = 1, h = 0, mi = 0, s = 0] = parts;
  const ms = Number((millis ?? "0").padEnd(3, "0"));

  const utc = new Date(Date.UTC(y, mo - 1, d, h, mi, s, ms));
  // Reject rollovers such as 2024-02-30 or 25:00
  if (
    utc.getUTCFullYear() !== y ||
    utc.getUTCMonth() !== mo - 1 ||
    utc.getUTCDate() !== d ||
    utc.getUTCHours() !== h ||
    utc.getUTCMinutes() !== mi ||
    utc.getUTCSeconds() !== s
  ) {
    return null;
  }

  if (zone === undefined || zone === "Z") {
    return utc;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const offsetMinutes =
    Number(zone.slice(1, 3)) * 60 + Number(zone.slice(-2));
  return new Date(utc.getTime() - sign * offsetMinutes * 60_000);
}

/**
 * Normalize a front-matter date (YAML timestamp or ISO 8601 string).
 * Midnight-UTC values collapse to a plain date, anything else keeps the
 * full ISO timestamp. Returns null when the value is not a valid date.
 *
 * @example
 * normalizeDate("2024-03-05") // "2024-03-05"
 * normalizeDate(new Date("2024-03-05T08:15:00Z")) // "2024-03-05T08:15:00.000Z"
 */
export function normalizeDate(value: string | Date): string | null {
  const date = value instanceof Date ? value : parseISODate(value);
  if (date === null || Number.isNaN(date.getTime())) {
    return null;
  }
  const iso = date.toISOString();
  return iso.endsWith("T00:00:00.000Z") ? toISODateString(date) : iso;
}

/**
 * Format a date in RFC 822 form (required by RSS 2.0)
 *
 * @example
 * formatRFC822Date("2024-01-01") // "Mon, 01 Jan 2024 00:00:00 GMT"
 */
export function formatRFC822Date(isoDate: string): string {
  return new Date(isoDate).toUTCString();
}
