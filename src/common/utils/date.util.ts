import { addDays, format, isValid, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";

/**
 * Calendar-date helpers.
 *
 * Holiday and move dates are plain calendar dates ("YYYY-MM-DD"). They are
 * compared as strings (lexicographic order equals chronological order for
 * this format) and only turned into Date objects for day arithmetic.
 */

const DATE_ONLY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Checks that a value is a real calendar date in "YYYY-MM-DD" form.
 *
 * @example
 * isDateOnlyString("2026-02-28") // true
 * isDateOnlyString("2026-02-30") // false
 * isDateOnlyString("28/02/2026") // false
 */
export function isDateOnlyString(value: unknown): value is string {
  if (typeof value !== "string" || !DATE_ONLY_PATTERN.test(value)) {
    return false;
  }
  const parsed = parseISO(value);
  return isValid(parsed) && format(parsed, "yyyy-MM-dd") === value;
}

/**
 * Adds a number of calendar days to a "YYYY-MM-DD" date.
 */
export function addDaysToDateString(date: string, days: number): string {
  return format(addDays(parseISO(date), days), "yyyy-MM-dd");
}

export function yearOf(date: string): number {
  return parseInt(date.slice(0, 4), 10);
}

/**
 * Formats an instant as "YYYY-MM-DD" in a specific timezone.
 *
 * A batch created at 23:30 UTC belongs to the next calendar day in
 * Australia/Melbourne; holiday windows are anchored to the local day.
 */
export function formatInRegionTimezone(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, "yyyy-MM-dd");
}

/**
 * Gets the current date as "YYYY-MM-DD" in a specific timezone.
 */
export function getCurrentDateInTimezone(timezone: string): string {
  return formatInTimeZone(new Date(), timezone, "yyyy-MM-dd");
}

/**
 * Whether two inclusive calendar-date ranges share at least one day.
 */
export function rangesOverlap(
  a: { startDate: string; endDate: string },
  b: { startDate: string; endDate: string },
): boolean {
  return a.startDate <= b.endDate && a.endDate >= b.startDate;
}
