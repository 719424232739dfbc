import { basename, parse } from "path";

/**
 * A date read from a filename. The precision records which pattern matched;
 * missing components default to 1 and the time is always local midnight.
 */
export type FilenameDate =
  | { precision: "day"; year: number; month: number; day: number }
  | { precision: "month"; year: number; month: number }
  | { precision: "year"; year: number };

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const MIN_YEAR = 1900;
const MAX_YEAR = 2100;

interface DatePattern {
  pattern: RegExp;
  build(parts: number[]): FilenameDate | null;
}

function isValidYear(year: number): boolean {
  return year >= MIN_YEAR && year <= MAX_YEAR;
}

function isValidMonth(month: number): boolean {
  return month >= 1 && month <= 12;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

// Ordered most to least specific. Only the first pattern that matches is
// consulted: a malformed full date never degrades to year-month.
const DATE_PATTERNS: DatePattern[] = [
  {
    // YYYY.MM.DD / YYYY-MM-DD, separators may be mixed
    pattern: /(\d{4})[.-](\d{1,2})[.-](\d{1,2})/,
    build: ([year, month, day]) => {
      if (!isValidYear(year) || !isValidMonth(month) || day < 1 || day > 31) return null;
      if (day > daysInMonth(year, month)) return null;
      return { precision: "day", year, month, day };
    },
  },
  {
    // YYYY.MM / YYYY-MM not followed by another separated component
    pattern: /(\d{4})[.-](\d{1,2})(?![.-]\d)/,
    build: ([year, month]) => {
      if (!isValidYear(year) || !isValidMonth(month)) return null;
      return { precision: "month", year, month };
    },
  },
  {
    pattern: /(\d{4})(?![.-]\d)/,
    build: ([year]) => (isValidYear(year) ? { precision: "year", year } : null),
  },
];

/**
 * Extract a date from a filename, or null if none of the supported forms
 * (YYYY.MM.DD, YYYY.MM, YYYY with `.` or `-` separators) is found.
 * Any directory part and the last extension are ignored.
 */
export function inferDateFromFilename(filename: string): FilenameDate | null {
  const stem = parse(basename(filename)).name;

  for (const { pattern, build } of DATE_PATTERNS) {
    const match = pattern.exec(stem);
    if (match) {
      return build(match.slice(1).map((part) => parseInt(part, 10)));
    }
  }

  return null;
}

export function toCalendarDate(date: FilenameDate): CalendarDate {
  switch (date.precision) {
    case "day":
      return { year: date.year, month: date.month, day: date.day };
    case "month":
      return { year: date.year, month: date.month, day: 1 };
    case "year":
      return { year: date.year, month: 1, day: 1 };
  }
}

/** Local midnight of the inferred day. */
export function toLocalDate(date: FilenameDate): Date {
  const { year, month, day } = toCalendarDate(date);
  return new Date(year, month - 1, day, 0, 0, 0, 0);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Format as YYYY-MM-DD
 */
export function formatIsoDate(date: FilenameDate): string {
  const { year, month, day } = toCalendarDate(date);
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** EXIF DateTime form, `YYYY:MM:DD 00:00:00`. */
export function formatExifDateTime(date: FilenameDate): string {
  const { year, month, day } = toCalendarDate(date);
  return `${pad(year, 4)}:${pad(month)}:${pad(day)} 00:00:00`;
}

/** `MM/DD/YYYY HH:MM:SS` in local time, as macOS SetFile expects. */
export function formatSetFileDate(date: Date): string {
  return (
    `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${pad(date.getFullYear(), 4)} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
