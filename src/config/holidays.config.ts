export type SchoolHolidaySourceKind = "openholidays" | "file";

export interface HolidayConfig {
  /** ISO 3166-1 alpha-2 country the region codes belong to */
  countryCode: string;
  /** Calendar used to decide what "today" is when a batch is created */
  timezone: string;
  /** Length of the forward-looking window, in days */
  windowDays: number;
  fetchTimeoutMs: number;
  schoolSource: SchoolHolidaySourceKind;
  schoolHolidaysFile: string | null;
}

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const getHolidayConfig = (): HolidayConfig => {
  const source = process.env.SCHOOL_HOLIDAYS_SOURCE === "file" ? "file" : "openholidays";

  return {
    countryCode: (process.env.HOLIDAY_COUNTRY_CODE || "AU").toUpperCase(),
    timezone: process.env.HOLIDAY_TIMEZONE || "Australia/Melbourne",
    windowDays: parsePositiveInt(process.env.HOLIDAY_WINDOW_DAYS, 60),
    fetchTimeoutMs: parsePositiveInt(process.env.HOLIDAY_FETCH_TIMEOUT_MS, 10000),
    schoolSource: source,
    schoolHolidaysFile: process.env.SCHOOL_HOLIDAYS_FILE || null,
  };
};
