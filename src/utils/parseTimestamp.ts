import { isValid, parse } from "date-fns";

const DATE_TIME_FORMATS = [
  "yyyy/M/d H:mm",
  "yyyy/M/d H:mm:ss",
  "yyyy-M-d H:mm",
  "yyyy-M-d H:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss",
];

const DATE_FORMATS = ["yyyy/M/d", "yyyy-M-d"];

function parseWith(value: string | undefined | null, formats: string[]): Date | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  for (const fmt of formats) {
    const parsed = parse(trimmed, fmt, new Date(0));
    if (isValid(parsed)) return parsed;
  }
  return null;
}

/**
 * Parses a source timestamp such as "2025/9/15 08:30" (local time).
 *
 * @returns the parsed Date, or null when the string is empty or matches none of the known layouts
 */
export function parseTimestamp(value: string | undefined | null): Date | null {
  return parseWith(value, DATE_TIME_FORMATS);
}

/** Parses a calendar date such as "2025/9/15"; null when empty or malformed. */
export function parseCalendarDate(value: string | undefined | null): Date | null {
  return parseWith(value, DATE_FORMATS);
}

/** Date part of a timestamp string: "2025/9/15 08:30" -> Date for 2025-09-15 */
export function parseTimestampDate(value: string | undefined | null): Date | null {
  if (!value) return null;
  const [datePart] = value.trim().split(/\s+/);
  return parseCalendarDate(datePart);
}
