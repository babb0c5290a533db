import { DateTime } from "luxon";

/** A calendar day with no time or zone; `iso` is `YYYY-MM-DD` and sorts correctly as text. */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly iso: string;
}

/**
 * Formats accepted in the `date` key, tried in order.
 * "May 1, 2020", "Sep 3, 2021", "1 May 2020", "2020-05-01".
 */
export const DATE_FORMATS: readonly string[] = [
  "LLLL d, yyyy",
  "LLL d, yyyy",
  "d LLLL yyyy",
  "d LLL yyyy",
  "yyyy-MM-dd",
];

const LOCALE = "en-US";

export function parseCalendarDate(text: string): CalendarDate | null {
  const normalized = text.trim().replace(/\s+/g, " ");
  if (!normalized) return null;

  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(normalized, format, { locale: LOCALE, zone: "utc" });
    if (parsed.isValid) {
      return calendarDate(parsed.year, parsed.month, parsed.day);
    }
  }
  return null;
}

export function calendarDate(year: number, month: number, day: number): CalendarDate {
  const iso = `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
  return { year, month, day, iso };
}

/** Human-readable form used on pages: "May 1, 2020". */
export function formatCalendarDate(date: CalendarDate): string {
  return DateTime.fromObject(
    { year: date.year, month: date.month, day: date.day },
    { locale: LOCALE, zone: "utc" },
  ).toFormat("LLLL d, yyyy");
}

/** Negative when `a` is earlier than `b`. */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return a.iso < b.iso ? -1 : a.iso > b.iso ? 1 : 0;
}
