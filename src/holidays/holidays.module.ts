import { Logger, Module } from "@nestjs/common";
import { HolidayPeriodsService } from "./holiday-periods.service";
import { HolidaysController } from "./holidays.controller";
import { NagerDateModule } from "../external-apis/nager-date/nager-date.module";
import { OpenHolidaysModule } from "../external-apis/open-holidays/open-holidays.module";
import { OpenHolidaysSchoolSource } from "./sources/open-holidays.source";
import { FileSchoolHolidaySource } from "./sources/school-holidays-file.source";
import {
  SCHOOL_HOLIDAY_SOURCE,
  SchoolHolidaySource,
} from "./sources/school-holiday-source.interface";
import { getHolidayConfig } from "../config/holidays.config";

/**
 * Holidays Module
 *
 * Regional public and school holiday periods used to tag defragmentation
 * moves. The school holiday source is chosen by SCHOOL_HOLIDAYS_SOURCE.
 */
@Module({
  imports: [NagerDateModule, OpenHolidaysModule],
  controllers: [HolidaysController],
  providers: [
    HolidayPeriodsService,
    OpenHolidaysSchoolSource,
    {
      provide: SCHOOL_HOLIDAY_SOURCE,
      inject: [OpenHolidaysSchoolSource],
      useFactory: (openHolidays: OpenHolidaysSchoolSource): SchoolHolidaySource => {
        const { schoolSource, schoolHolidaysFile } = getHolidayConfig();
        if (schoolSource === "file") {
          if (schoolHolidaysFile) {
            return new FileSchoolHolidaySource(schoolHolidaysFile);
          }
          new Logger("HolidaysModule").warn(
            "SCHOOL_HOLIDAYS_SOURCE=file but SCHOOL_HOLIDAYS_FILE is not set, using OpenHolidays",
          );
        }
        return openHolidays;
      },
    },
  ],
  exports: [HolidayPeriodsService],
})
export class HolidaysModule {}
