import {
  DateRange,
  HolidayImportance,
  HolidayPeriod,
  PublicHoliday,
  SchoolHoliday,
} from "../types/holiday-period.type";
import { RegionCode } from "../types/region-code.type";
import { addDaysToDateString, rangesOverlap } from "./date.util";

/**
 * Holiday Period Utilities
 *
 * Turns raw public and school holiday calendars into labeled periods and
 * picks the period a move should be tagged with.
 *
 * Rules:
 * 1. Every public holiday becomes a one-day "public" period (medium).
 * 2. Public holidays on consecutive calendar days additionally form one
 *    multi-day "public" period spanning the run (high).
 * 3. School holiday ranges are kept as-is (low).
 * 4. Periods of different types are never merged, even when they overlap.
 */

export const IMPORTANCE_RANK: Record<HolidayImportance, number> = {
  high: 3,
  medium: 2,
  low: 1,
};

/**
 * Deduplicates public holidays on (date, name) and sorts them by date.
 * Same-day holidays are ordered by name so the output is deterministic.
 */
export function normalizePublicHolidays(
  holidays: PublicHoliday[],
): PublicHoliday[] {
  const unique = new Map<string, PublicHoliday>();
  for (const holiday of holidays) {
    const key = `${holiday.date}|${holiday.name}`;
    if (!unique.has(key)) {
      unique.set(key, { date: holiday.date, name: holiday.name });
    }
  }
  return Array.from(unique.values()).sort(
    (a, b) => a.date.localeCompare(b.date) || a.name.localeCompare(b.name),
  );
}

export function sortSchoolHolidays(holidays: SchoolHoliday[]): SchoolHoliday[] {
  return [...holidays].sort(
    (a, b) =>
      a.startDate.localeCompare(b.startDate) ||
      a.endDate.localeCompare(b.endDate) ||
      a.name.localeCompare(b.name),
  );
}

/**
 * Groups public holidays into runs of consecutive calendar days and returns
 * one multi-day period per run of two or more days.
 *
 * @example
 * // Christmas Day (25th) + Boxing Day (26th)
 * // -> { name: "Christmas Day / Boxing Day", startDate: "...-12-25", endDate: "...-12-26" }
 */
export function buildMultiDayPublicPeriods(
  holidays: PublicHoliday[],
  regionCode: RegionCode,
): HolidayPeriod[] {
  const namesByDate = new Map<string, string[]>();
  for (const holiday of normalizePublicHolidays(holidays)) {
    const names = namesByDate.get(holiday.date) ?? [];
    names.push(holiday.name);
    namesByDate.set(holiday.date, names);
  }

  const dates = Array.from(namesByDate.keys()).sort();
  const periods: HolidayPeriod[] = [];
  let run: string[] = [];

  const flush = (): void => {
    if (run.length >= 2) {
      const names: string[] = [];
      for (const date of run) {
        for (const name of namesByDate.get(date) ?? []) {
          if (!names.includes(name)) names.push(name);
        }
      }
      periods.push({
        name: names.join(" / "),
        type: "public",
        importance: "high",
        startDate: run[0],
        endDate: run[run.length - 1],
        regionCode,
      });
    }
    run = [];
  };

  for (const date of dates) {
    const previous = run[run.length - 1];
    if (previous && addDaysToDateString(previous, 1) !== date) {
      flush();
    }
    run.push(date);
  }
  flush();

  return periods;
}

/**
 * Builds the combined, forward-looking period list.
 *
 * Keeps periods whose start date lies in [fromDate, fromDate + windowDays),
 * sorted by start date. Same-day starts are ordered by importance (highest
 * first), then name.
 */
export function buildForwardPeriods(
  publicHolidays: PublicHoliday[],
  schoolHolidays: SchoolHoliday[],
  regionCode: RegionCode,
  fromDate: string,
  windowDays: number,
): HolidayPeriod[] {
  const windowEnd = addDaysToDateString(fromDate, windowDays);

  const singleDay: HolidayPeriod[] = normalizePublicHolidays(publicHolidays).map(
    (holiday) => ({
      name: holiday.name,
      type: "public",
      importance: "medium",
      startDate: holiday.date,
      endDate: holiday.date,
      regionCode,
    }),
  );

  const school: HolidayPeriod[] = schoolHolidays.map((holiday) => ({
    name: holiday.name,
    type: "school",
    importance: "low",
    startDate: holiday.startDate,
    endDate: holiday.endDate,
    regionCode,
  }));

  const all = [
    ...buildMultiDayPublicPeriods(publicHolidays, regionCode),
    ...singleDay,
    ...school,
  ];

  // A school term spanning New Year is listed under both years
  const unique = new Map<string, HolidayPeriod>();
  for (const period of all) {
    if (period.startDate < fromDate || period.startDate >= windowEnd) continue;
    const key = `${period.type}|${period.name}|${period.startDate}|${period.endDate}`;
    if (!unique.has(key)) unique.set(key, period);
  }

  return Array.from(unique.values()).sort(
    (a, b) =>
      a.startDate.localeCompare(b.startDate) ||
      IMPORTANCE_RANK[b.importance] - IMPORTANCE_RANK[a.importance] ||
      a.name.localeCompare(b.name),
  );
}

/**
 * Picks the period a date range should be tagged with.
 *
 * Among overlapping periods the highest importance wins; ties go to the
 * earliest start date, then to list order.
 *
 * @returns The winning period, or null when nothing overlaps
 */
export function selectPeriodForRange(
  periods: HolidayPeriod[],
  range: DateRange,
): HolidayPeriod | null {
  let best: HolidayPeriod | null = null;
  for (const period of periods) {
    if (!rangesOverlap(period, range)) continue;
    if (
      !best ||
      IMPORTANCE_RANK[period.importance] > IMPORTANCE_RANK[best.importance] ||
      (IMPORTANCE_RANK[period.importance] === IMPORTANCE_RANK[best.importance] &&
        period.startDate < best.startDate)
    ) {
      best = period;
    }
  }
  return best;
}
