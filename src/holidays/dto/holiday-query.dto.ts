import { IsInt, IsOptional, Matches, Max, Min } from "class-validator";
import { Type } from "class-transformer";
import { ApiPropertyOptional } from "@nestjs/swagger";

export class HolidayYearQueryDto {
  @ApiPropertyOptional({
    description: "Calendar year (defaults to the current year in the holiday timezone)",
    example: 2026,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1900)
  @Max(2100)
  year?: number;
}

export class HolidayPeriodsQueryDto {
  @ApiPropertyOptional({
    description: "First day of the window (YYYY-MM-DD, defaults to today)",
    example: "2026-03-20",
  })
  @IsOptional()
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: "from must be YYYY-MM-DD" })
  from?: string;

  @ApiPropertyOptional({
    description: "Window length in days (defaults to HOLIDAY_WINDOW_DAYS)",
    example: 60,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(730)
  window?: number;
}
