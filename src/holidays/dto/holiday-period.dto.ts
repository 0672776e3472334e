import { ApiProperty } from "@nestjs/swagger";
import {
  HolidayImportance,
  HolidayPeriod,
  HolidayPeriodType,
  PublicHoliday,
  SchoolHoliday,
} from "../../common/types/holiday-period.type";
import { REGION_CODES, RegionCode } from "../../common/types/region-code.type";

export class PublicHolidayDto {
  @ApiProperty({ description: "Date of the holiday (YYYY-MM-DD)" })
  date!: string;

  @ApiProperty({ description: "Name of the holiday (English)" })
  name!: string;

  static fromHoliday(holiday: PublicHoliday): PublicHolidayDto {
    const dto = new PublicHolidayDto();
    dto.date = holiday.date;
    dto.name = holiday.name;
    return dto;
  }
}

export class SchoolHolidayDto {
  @ApiProperty({ example: "Term 1 School Holidays" })
  name!: string;

  @ApiProperty({ description: "First day (YYYY-MM-DD)" })
  startDate!: string;

  @ApiProperty({ description: "Last day, inclusive (YYYY-MM-DD)" })
  endDate!: string;

  static fromHoliday(holiday: SchoolHoliday): SchoolHolidayDto {
    const dto = new SchoolHolidayDto();
    dto.name = holiday.name;
    dto.startDate = holiday.startDate;
    dto.endDate = holiday.endDate;
    return dto;
  }
}

/**
 * Holiday Period DTO
 *
 * A named single- or multi-day range of a public or school holiday.
 */
export class HolidayPeriodDto {
  @ApiProperty({ example: "Good Friday / Easter Saturday / Easter Monday" })
  name!: string;

  @ApiProperty({ enum: ["public", "school"] })
  type!: HolidayPeriodType;

  @ApiProperty({
    enum: ["high", "medium", "low"],
    description:
      "high: multi-day public holiday, medium: single public holiday, low: school holidays",
  })
  importance!: HolidayImportance;

  @ApiProperty({ description: "First day (YYYY-MM-DD)" })
  startDate!: string;

  @ApiProperty({ description: "Last day, inclusive (YYYY-MM-DD)" })
  endDate!: string;

  @ApiProperty({ enum: [...REGION_CODES] })
  regionCode!: RegionCode;

  static fromPeriod(period: HolidayPeriod): HolidayPeriodDto {
    const dto = new HolidayPeriodDto();
    dto.name = period.name;
    dto.type = period.type;
    dto.importance = period.importance;
    dto.startDate = period.startDate;
    dto.endDate = period.endDate;
    dto.regionCode = period.regionCode;
    return dto;
  }
}
