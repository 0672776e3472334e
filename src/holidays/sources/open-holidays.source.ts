import { Injectable } from "@nestjs/common";
import { OpenHolidaysClient } from "../../external-apis/open-holidays/open-holidays.client";
import { pickEnglishName } from "../../external-apis/open-holidays/open-holidays.types";
import { SchoolHolidaySource } from "./school-holiday-source.interface";
import { RegionCode } from "../../common/types/region-code.type";
import { SchoolHoliday } from "../../common/types/holiday-period.type";
import { getHolidayConfig } from "../../config/holidays.config";
import { isDateOnlyString } from "../../common/utils/date.util";

/**
 * School holidays from the OpenHolidays API, one request per region and year.
 */
@Injectable()
export class OpenHolidaysSchoolSource implements SchoolHolidaySource {
  readonly kind = "openholidays";
  private readonly countryCode = getHolidayConfig().countryCode;

  constructor(private readonly openHolidaysClient: OpenHolidaysClient) {}

  async getSchoolHolidays(region: RegionCode, year: number): Promise<SchoolHoliday[]> {
    const subdivisionCode = `${this.countryCode}-${region}`;
    const entries = await this.openHolidaysClient.getSchoolHolidays(
      this.countryCode,
      subdivisionCode,
      `${year}-01-01`,
      `${year}-12-31`,
    );

    const holidays: SchoolHoliday[] = [];
    for (const entry of entries) {
      if (!isDateOnlyString(entry.startDate) || !isDateOnlyString(entry.endDate)) {
        continue;
      }

      // Some countries publish groups instead of subdivisions
      let regionCodes = entry.subdivisions?.map((s) => s.code) ?? [];
      if (regionCodes.length === 0 && entry.groups) {
        regionCodes = entry.groups.map((g) => g.code);
      }
      if (!entry.nationwide && !regionCodes.includes(subdivisionCode)) {
        continue;
      }

      holidays.push({
        name: pickEnglishName(entry),
        startDate: entry.startDate,
        endDate: entry.endDate,
      });
    }
    return holidays;
  }
}
