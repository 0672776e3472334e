import { ApiProperty } from "@nestjs/swagger";
import { REGION_CODES, RegionCode } from "../../common/types/region-code.type";
import {
  HolidayPeriodDto,
  PublicHolidayDto,
  SchoolHolidayDto,
} from "./holiday-period.dto";

export class PublicHolidayResponseDto {
  @ApiProperty({ enum: [...REGION_CODES] })
  region!: RegionCode;

  @ApiProperty({ example: 2026 })
  year!: number;

  @ApiProperty({ type: [PublicHolidayDto] })
  holidays!: PublicHolidayDto[];
}

export class SchoolHolidayResponseDto {
  @ApiProperty({ enum: [...REGION_CODES] })
  region!: RegionCode;

  @ApiProperty({ example: 2026 })
  year!: number;

  @ApiProperty({ type: [SchoolHolidayDto] })
  holidays!: SchoolHolidayDto[];
}

export class HolidayPeriodsResponseDto {
  @ApiProperty({ enum: [...REGION_CODES] })
  region!: RegionCode;

  @ApiProperty({ description: "First day of the window (YYYY-MM-DD)" })
  from!: string;

  @ApiProperty({ description: "Window length in days" })
  window!: number;

  @ApiProperty({ type: [HolidayPeriodDto] })
  periods!: HolidayPeriodDto[];
}
