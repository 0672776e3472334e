import { RegionCode } from "../../common/types/region-code.type";
import { SchoolHoliday } from "../../common/types/holiday-period.type";

export const SCHOOL_HOLIDAY_SOURCE = "SCHOOL_HOLIDAY_SOURCE";

/**
 * Pull-based, read-only provider of school holiday ranges for one region
 * and year. Implementations throw UpstreamUnavailableError when the
 * calendar cannot be read; they never cache.
 */
export interface SchoolHolidaySource {
  readonly kind: string;
  getSchoolHolidays(region: RegionCode, year: number): Promise<SchoolHoliday[]>;
}
