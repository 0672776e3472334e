import { Inject, Injectable, Logger } from "@nestjs/common";
import { NagerDateClient } from "../external-apis/nager-date/nager-date.client";
import {
  SCHOOL_HOLIDAY_SOURCE,
  SchoolHolidaySource,
} from "./sources/school-holiday-source.interface";
import { RegionCode } from "../common/types/region-code.type";
import {
  HolidayPeriod,
  PublicHoliday,
  SchoolHoliday,
} from "../common/types/holiday-period.type";
import { getHolidayConfig } from "../config/holidays.config";
import {
  addDaysToDateString,
  isDateOnlyString,
  yearOf,
} from "../common/utils/date.util";
import {
  buildForwardPeriods,
  normalizePublicHolidays,
  sortSchoolHolidays,
} from "../common/utils/holiday.utils";
import { describeError } from "../common/errors/upstream.error";
import { LedgerValidationError } from "../common/errors/ledger.errors";

export interface HolidayCacheStats {
  publicKeys: string[];
  schoolKeys: string[];
}

/**
 * Holiday Period Service
 *
 * Merges public holidays (Nager.Date) and school holidays (configured
 * source) per region into labeled periods for a forward-looking window.
 *
 * Lookups are cached per (country, region, year) for the life of the
 * process: a published calendar for a given year does not change. Failed
 * lookups are logged, answered with an empty list and not cached, so the
 * next call tries again. Enrichment is best-effort and never throws for
 * upstream trouble.
 */
@Injectable()
export class HolidayPeriodsService {
  private readonly logger = new Logger(HolidayPeriodsService.name);
  private readonly config = getHolidayConfig();
  private readonly publicCache = new Map<string, Promise<PublicHoliday[]>>();
  private readonly schoolCache = new Map<string, Promise<SchoolHoliday[]>>();

  constructor(
    private readonly nagerDateClient: NagerDateClient,
    @Inject(SCHOOL_HOLIDAY_SOURCE)
    private readonly schoolSource: SchoolHolidaySource,
  ) {}

  /**
   * Public holidays observed in a region, deduplicated on (date, name) and
   * sorted by date.
   *
   * Keeps national holidays and regional ones whose subdivisions include
   * the region (e.g. "AU-VIC").
   */
  async publicHolidays(region: RegionCode, year: number): Promise<PublicHoliday[]> {
    const { countryCode } = this.config;
    const key = `${countryCode}:${region}:${year}`;

    return this.memoize(this.publicCache, key, "public", async () => {
      const subdivision = `${countryCode}-${region}`;
      const holidays = await this.nagerDateClient.getPublicHolidays(year, countryCode);

      return normalizePublicHolidays(
        holidays
          .filter(
            (holiday) =>
              holiday.global || (holiday.counties ?? []).includes(subdivision),
          )
          .filter(
            (holiday) => isDateOnlyString(holiday.date) && yearOf(holiday.date) === year,
          )
          .map((holiday) => ({ date: holiday.date, name: holiday.name })),
      );
    });
  }

  /**
   * School holiday ranges for a region, sorted by start date.
   */
  async schoolHolidays(region: RegionCode, year: number): Promise<SchoolHoliday[]> {
    const key = `${this.schoolSource.kind}:${this.config.countryCode}:${region}:${year}`;

    return this.memoize(this.schoolCache, key, "school", async () => {
      const holidays = await this.schoolSource.getSchoolHolidays(region, year);
      return sortSchoolHolidays(
        holidays.filter((holiday) => holiday.startDate <= holiday.endDate),
      );
    });
  }

  /**
   * Combined public and school periods starting in
   * [fromDate, fromDate + windowDays), sorted by start date.
   *
   * @param fromDate - First day of the window (YYYY-MM-DD)
   * @param windowDays - Window length; defaults to HOLIDAY_WINDOW_DAYS
   * @throws LedgerValidationError for a malformed date or window
   */
  async combinedForwardPeriods(
    region: RegionCode,
    fromDate: string,
    windowDays: number = this.config.windowDays,
  ): Promise<HolidayPeriod[]> {
    if (!isDateOnlyString(fromDate)) {
      throw new LedgerValidationError(`fromDate must be YYYY-MM-DD, got "${fromDate}"`);
    }
    if (!Number.isInteger(windowDays) || windowDays <= 0) {
      throw new LedgerValidationError(`window must be a positive number of days`);
    }

    const lastDay = addDaysToDateString(fromDate, windowDays - 1);
    const years: number[] = [];
    for (let year = yearOf(fromDate); year <= yearOf(lastDay); year++) {
      years.push(year);
    }

    const [publicByYear, schoolByYear] = await Promise.all([
      Promise.all(years.map((year) => this.publicHolidays(region, year))),
      Promise.all(years.map((year) => this.schoolHolidays(region, year))),
    ]);

    const periods = buildForwardPeriods(
      publicByYear.flat(),
      schoolByYear.flat(),
      region,
      fromDate,
      windowDays,
    );

    this.logger.debug(
      `${periods.length} holiday periods for ${region} from ${fromDate} (${windowDays} days)`,
    );
    return periods;
  }

  clearCache(): void {
    this.publicCache.clear();
    this.schoolCache.clear();
    this.logger.log("Holiday cache cleared");
  }

  cacheStats(): HolidayCacheStats {
    return {
      publicKeys: Array.from(this.publicCache.keys()),
      schoolKeys: Array.from(this.schoolCache.keys()),
    };
  }

  /**
   * Shares one in-flight lookup between concurrent callers of the same key.
   */
  private memoize<T>(
    cache: Map<string, Promise<T[]>>,
    key: string,
    label: string,
    load: () => Promise<T[]>,
  ): Promise<T[]> {
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }

    const pending = load().catch((error: unknown): T[] => {
      cache.delete(key);
      this.logger.warn(
        `Upstream unavailable for ${label} holidays ${key}, continuing without them: ${describeError(error)}`,
      );
      return [];
    });
    cache.set(key, pending);
    return pending;
  }
}
