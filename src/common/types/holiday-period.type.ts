import { RegionCode } from "./region-code.type";

/**
 * Holiday Period Types
 *
 * All dates are calendar dates ("YYYY-MM-DD") without a time component.
 */

export type HolidayPeriodType = "public" | "school";

/**
 * Importance ranking, highest first:
 * - high: multi-day public holiday periods (e.g. the Easter break)
 * - medium: single-day public holidays
 * - low: school holiday periods
 */
export type HolidayImportance = "high" | "medium" | "low";

export interface PublicHoliday {
  date: string;
  name: string;
}

export interface SchoolHoliday {
  name: string;
  startDate: string;
  endDate: string;
}

export interface HolidayPeriod {
  name: string;
  type: HolidayPeriodType;
  importance: HolidayImportance;
  startDate: string;
  /** Inclusive */
  endDate: string;
  regionCode: RegionCode;
}

/** Inclusive calendar-date range */
export interface DateRange {
  startDate: string;
  endDate: string;
}
