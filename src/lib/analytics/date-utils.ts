import { differenceInCalendarDays, format, isValid, parse, parseISO } from "date-fns";
import type { CellValue } from "../table/table";

/**
 * Parse dates found in analytics exports:
 *
 * Date id:      "20240105" (or the number 20240105)
 * Plain date:   "2024-01-05"
 * Date + time:  "2024-01-05 14:30:00"
 * ISO:          "2024-01-05T14:30:00Z"
 * US:           "1/5/2024"
 */
export function parseDate(value: CellValue): Date | null {
  if (value === null) return null;
  const str = String(value).trim();
  if (!str) return null;

  if (/^\d{8}$/.test(str)) {
    const d = parse(str, "yyyyMMdd", new Date(0));
    return isValid(d) ? d : null;
  }

  const dateTimeMatch = str.match(/^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2}(?::\d{2})?))?/);
  if (dateTimeMatch && !/[zZ]|[+-]\d{2}:?\d{2}$/.test(str.slice(10))) {
    const iso = dateTimeMatch[2] ? `${dateTimeMatch[1]}T${dateTimeMatch[2]}` : dateTimeMatch[1];
    const d = parseISO(iso);
    if (isValid(d)) return d;
  }

  const iso = parseISO(str);
  if (isValid(iso)) return iso;

  const usMatch = str.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (usMatch) {
    const d = new Date(parseInt(usMatch[3]), parseInt(usMatch[1]) - 1, parseInt(usMatch[2]));
    if (isValid(d)) return d;
  }

  return null;
}

/** `20240105` → `2024-01-05`; anything unparseable becomes null. */
export function formatDateId(value: CellValue): CellValue {
  if (value === null) return null;
  const str = String(value).trim();
  if (!/^\d{8}$/.test(str)) return null;
  const d = parse(str, "yyyyMMdd", new Date(0));
  return isValid(d) ? format(d, "yyyy-MM-dd") : null;
}

export function formatDay(date: Date): string {
  return format(date, "yyyy-MM-dd");
}

/** Whole calendar days from `from` to `to`. */
export function daysBetween(from: Date, to: Date): number {
  return differenceInCalendarDays(to, from);
}

/** Strict `YYYY-MM-DD`. */
export function parseDayKey(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const d = parse(value, "yyyy-MM-dd", new Date(0));
  return isValid(d) ? d : null;
}

export function filenameTimestamp(date: Date = new Date()): string {
  return format(date, "yyyy-MM-dd_HH-mm-ss");
}
