import { Controller, Get, Param, Query } from "@nestjs/common";
import {
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiTags,
} from "@nestjs/swagger";
import { HolidayPeriodsService } from "./holiday-periods.service";
import {
  HolidayPeriodsQueryDto,
  HolidayYearQueryDto,
} from "./dto/holiday-query.dto";
import {
  HolidayPeriodsResponseDto,
  PublicHolidayResponseDto,
  SchoolHolidayResponseDto,
} from "./dto/holiday-response.dto";
import {
  HolidayPeriodDto,
  PublicHolidayDto,
  SchoolHolidayDto,
} from "./dto/holiday-period.dto";
import { RegionCode, REGION_CODES } from "../common/types/region-code.type";
import { normalizeRegionCode } from "../common/utils/region.util";
import { getCurrentDateInTimezone, yearOf } from "../common/utils/date.util";
import { getHolidayConfig } from "../config/holidays.config";
import { LedgerValidationError } from "../common/errors/ledger.errors";

/**
 * Holidays Controller
 *
 * Read-only access to the regional holiday calendars the ledger tags moves
 * with.
 *
 * Endpoints:
 * - GET /holidays/:region/public - Public holidays for a year
 * - GET /holidays/:region/school - School holidays for a year
 * - GET /holidays/:region/periods - Combined forward-looking periods
 */
@ApiTags("holidays")
@Controller("holidays")
export class HolidaysController {
  private readonly config = getHolidayConfig();

  constructor(private readonly holidayPeriodsService: HolidayPeriodsService) {}

  /**
   * GET /v1/holidays/:region/public
   *
   * @param region - State or territory code (e.g. "VIC", "AU-NSW", "Victoria")
   * @throws LedgerValidationError if the region is unknown
   */
  @Get(":region/public")
  @ApiOperation({ summary: "Public holidays observed in a region" })
  @ApiParam({ name: "region", enum: [...REGION_CODES] })
  @ApiResponse({ status: 200, type: PublicHolidayResponseDto })
  @ApiResponse({ status: 400, description: "Unknown region or invalid year" })
  async getPublicHolidays(
    @Param("region") regionParam: string,
    @Query() query: HolidayYearQueryDto,
  ): Promise<PublicHolidayResponseDto> {
    const region = this.parseRegion(regionParam);
    const year = query.year ?? this.currentYear();
    const holidays = await this.holidayPeriodsService.publicHolidays(region, year);

    return {
      region,
      year,
      holidays: holidays.map((h) => PublicHolidayDto.fromHoliday(h)),
    };
  }

  /**
   * GET /v1/holidays/:region/school
   */
  @Get(":region/school")
  @ApiOperation({ summary: "School holidays for a region" })
  @ApiParam({ name: "region", enum: [...REGION_CODES] })
  @ApiResponse({ status: 200, type: SchoolHolidayResponseDto })
  @ApiResponse({ status: 400, description: "Unknown region or invalid year" })
  async getSchoolHolidays(
    @Param("region") regionParam: string,
    @Query() query: HolidayYearQueryDto,
  ): Promise<SchoolHolidayResponseDto> {
    const region = this.parseRegion(regionParam);
    const year = query.year ?? this.currentYear();
    const holidays = await this.holidayPeriodsService.schoolHolidays(region, year);

    return {
      region,
      year,
      holidays: holidays.map((h) => SchoolHolidayDto.fromHoliday(h)),
    };
  }

  /**
   * GET /v1/holidays/:region/periods
   *
   * Periods starting in [from, from + window), sorted by start date.
   * Defaults: from = today in the holiday timezone, window = HOLIDAY_WINDOW_DAYS.
   */
  @Get(":region/periods")
  @ApiOperation({
    summary: "Combined holiday periods",
    description:
      "Public holidays (single and multi-day) and school holidays starting within the window.",
  })
  @ApiParam({ name: "region", enum: [...REGION_CODES] })
  @ApiResponse({ status: 200, type: HolidayPeriodsResponseDto })
  @ApiResponse({ status: 400, description: "Unknown region or invalid window" })
  async getPeriods(
    @Param("region") regionParam: string,
    @Query() query: HolidayPeriodsQueryDto,
  ): Promise<HolidayPeriodsResponseDto> {
    const region = this.parseRegion(regionParam);
    const from = query.from ?? getCurrentDateInTimezone(this.config.timezone);
    const window = query.window ?? this.config.windowDays;

    const periods = await this.holidayPeriodsService.combinedForwardPeriods(
      region,
      from,
      window,
    );

    return {
      region,
      from,
      window,
      periods: periods.map((p) => HolidayPeriodDto.fromPeriod(p)),
    };
  }

  private parseRegion(value: string): RegionCode {
    const region = normalizeRegionCode(value);
    if (!region) {
      throw new LedgerValidationError(
        `Unknown region "${value}". Expected one of: ${REGION_CODES.join(", ")}`,
      );
    }
    return region;
  }

  private currentYear(): number {
    return yearOf(getCurrentDateInTimezone(this.config.timezone));
  }
}
