/**
 * Time parsing and archive day enumeration
 */

import type { DayDirectory } from "./types.js";

// Date, optional time, optional zone; times without a zone are UTC
const ISO_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?(Z|[+-]\d{2}:\d{2})?$/;

// Rejects days past the end of the month, which Date would roll over
const isCalendarDate = (year: number, month: number, day: number): boolean => {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
};

/**
 * Parse a time given as a Date, epoch milliseconds, or an ISO 8601 string.
 * Returns undefined for anything else.
 */
export const parseTime = (value: unknown): Date | undefined => {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value) : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const match = ISO_TIME.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const [, year = "", month = "", day = "", time = "00:00", zone = "Z"] =
    match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) {
    return undefined;
  }
  const parsed = new Date(`${year}-${month}-${day}T${time}${zone}`);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
};

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * One directory per UTC day from the day of `start` through the day of
 * `end`, laid out as `<baseUrl>/yyyy/mm/dd/`.
 */
export const dayDirectories = (
  baseUrl: string,
  instrument: string,
  start: Date,
  end: Date
): DayDirectory[] => {
  const root = baseUrl.replace(/\/+$/, "");
  const directories: DayDirectory[] = [];
  const day = new Date(
    Date.UTC(start.getUTCFullYear(), start.getUTCMonth(), start.getUTCDate())
  );

  while (day.getTime() <= end.getTime()) {
    const yyyy = String(day.getUTCFullYear());
    const mm = pad(day.getUTCMonth() + 1);
    const dd = pad(day.getUTCDate());
    directories.push({
      url: `${root}/${yyyy}/${mm}/${dd}/`,
      prefix: `${instrument}_${yyyy}${mm}${dd}`,
    });
    day.setUTCDate(day.getUTCDate() + 1);
  }

  return directories;
};
