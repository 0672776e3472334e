import { Test, TestingModule } from "@nestjs/testing";
import { HolidayPeriodsService } from "./holiday-periods.service";
import { NagerDateClient } from "../external-apis/nager-date/nager-date.client";
import { NagerPublicHoliday } from "../external-apis/nager-date/nager-date.types";
import { SCHOOL_HOLIDAY_SOURCE } from "./sources/school-holiday-source.interface";
import { UpstreamUnavailableError } from "../common/errors/upstream.error";
import { LedgerValidationError } from "../common/errors/ledger.errors";

const nagerHoliday = (
  date: string,
  name: string,
  counties: string[] | null = null,
): NagerPublicHoliday => ({
  date,
  localName: name,
  name,
  countryCode: "AU",
  global: counties === null,
  counties,
  types: ["Public"],
});

describe("HolidayPeriodsService", () => {
  let service: HolidayPeriodsService;

  const mockNagerDateClient = {
    getPublicHolidays: jest.fn(),
  };

  const mockSchoolSource = {
    kind: "openholidays",
    getSchoolHolidays: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockNagerDateClient.getPublicHolidays.mockResolvedValue([]);
    mockSchoolSource.getSchoolHolidays.mockResolvedValue([]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HolidayPeriodsService,
        { provide: NagerDateClient, useValue: mockNagerDateClient },
        { provide: SCHOOL_HOLIDAY_SOURCE, useValue: mockSchoolSource },
      ],
    }).compile();

    service = module.get<HolidayPeriodsService>(HolidayPeriodsService);
  });

  describe("publicHolidays", () => {
    it("should keep national holidays and those of the region", async () => {
      mockNagerDateClient.getPublicHolidays.mockResolvedValue([
        nagerHoliday("2026-03-09", "Labour Day", ["AU-VIC"]),
        nagerHoliday("2026-01-26", "Australia Day"),
        nagerHoliday("2026-03-02", "Labour Day", ["AU-WA"]),
        nagerHoliday("2025-12-25", "Christmas Day"),
      ]);

      const holidays = await service.publicHolidays("VIC", 2026);

      expect(mockNagerDateClient.getPublicHolidays).toHaveBeenCalledWith(2026, "AU");
      expect(holidays).toEqual([
        { date: "2026-01-26", name: "Australia Day" },
        { date: "2026-03-09", name: "Labour Day" },
      ]);
    });

    it("should fetch each region and year once", async () => {
      await service.publicHolidays("VIC", 2026);
      await service.publicHolidays("VIC", 2026);
      await service.publicHolidays("NSW", 2026);

      expect(mockNagerDateClient.getPublicHolidays).toHaveBeenCalledTimes(2);
      expect(service.cacheStats().publicKeys).toEqual(["AU:VIC:2026", "AU:NSW:2026"]);
    });

    it("should return an empty list on upstream failure and retry next time", async () => {
      mockNagerDateClient.getPublicHolidays
        .mockRejectedValueOnce(new UpstreamUnavailableError("Nager.Date", "timeout"))
        .mockResolvedValueOnce([nagerHoliday("2026-04-25", "Anzac Day")]);

      expect(await service.publicHolidays("VIC", 2026)).toEqual([]);
      expect(service.cacheStats().publicKeys).toEqual([]);

      expect(await service.publicHolidays("VIC", 2026)).toEqual([
        { date: "2026-04-25", name: "Anzac Day" },
      ]);
      expect(mockNagerDateClient.getPublicHolidays).toHaveBeenCalledTimes(2);
    });
  });

  describe("schoolHolidays", () => {
    it("should sort ranges and drop inverted ones", async () => {
      mockSchoolSource.getSchoolHolidays.mockResolvedValue([
        { name: "Term 2 School Holidays", startDate: "2026-06-27", endDate: "2026-07-12" },
        { name: "Term 1 School Holidays", startDate: "2026-04-03", endDate: "2026-04-19" },
        { name: "Broken", startDate: "2026-05-10", endDate: "2026-05-01" },
      ]);

      const holidays = await service.schoolHolidays("VIC", 2026);

      expect(mockSchoolSource.getSchoolHolidays).toHaveBeenCalledWith("VIC", 2026);
      expect(holidays.map((h) => h.name)).toEqual([
        "Term 1 School Holidays",
        "Term 2 School Holidays",
      ]);
      expect(service.cacheStats().schoolKeys).toEqual(["openholidays:AU:VIC:2026"]);
    });
  });

  describe("combinedForwardPeriods", () => {
    it("should merge calendars of every year the window touches", async () => {
      mockNagerDateClient.getPublicHolidays.mockImplementation(async (year: number) =>
        year === 2026
          ? [nagerHoliday("2026-12-25", "Christmas Day"), nagerHoliday("2026-12-26", "Boxing Day")]
          : [nagerHoliday("2027-01-01", "New Year's Day")],
      );
      mockSchoolSource.getSchoolHolidays.mockResolvedValue([
        { name: "Summer School Holidays", startDate: "2026-12-21", endDate: "2027-01-27" },
      ]);

      const periods = await service.combinedForwardPeriods("VIC", "2026-12-20", 20);

      expect(mockNagerDateClient.getPublicHolidays.mock.calls).toEqual([
        [2026, "AU"],
        [2027, "AU"],
      ]);
      expect(periods.map((p) => [p.startDate, p.endDate, p.type, p.importance, p.name])).toEqual([
        ["2026-12-21", "2027-01-27", "school", "low", "Summer School Holidays"],
        ["2026-12-25", "2026-12-26", "public", "high", "Christmas Day / Boxing Day"],
        ["2026-12-25", "2026-12-25", "public", "medium", "Christmas Day"],
        ["2026-12-26", "2026-12-26", "public", "medium", "Boxing Day"],
        ["2027-01-01", "2027-01-01", "public", "medium", "New Year's Day"],
      ]);
      expect(periods.every((p) => p.regionCode === "VIC")).toBe(true);
    });

    it("should still return school periods when public holidays are unavailable", async () => {
      mockNagerDateClient.getPublicHolidays.mockRejectedValue(new Error("socket hang up"));
      mockSchoolSource.getSchoolHolidays.mockResolvedValue([
        { name: "Term 1 School Holidays", startDate: "2026-04-03", endDate: "2026-04-19" },
      ]);

      const periods = await service.combinedForwardPeriods("VIC", "2026-03-25", 60);

      expect(periods.map((p) => p.name)).toEqual(["Term 1 School Holidays"]);
    });

    it("should reject a malformed date or window", async () => {
      await expect(service.combinedForwardPeriods("VIC", "2026-02-30", 60)).rejects.toThrow(
        LedgerValidationError,
      );
      await expect(service.combinedForwardPeriods("VIC", "2026-03-25", 0)).rejects.toThrow(
        "window must be a positive number of days",
      );
      expect(mockNagerDateClient.getPublicHolidays).not.toHaveBeenCalled();
    });
  });

  describe("clearCache", () => {
    it("should forget cached calendars", async () => {
      await service.publicHolidays("VIC", 2026);
      await service.schoolHolidays("VIC", 2026);

      service.clearCache();

      expect(service.cacheStats()).toEqual({ publicKeys: [], schoolKeys: [] });
    });
  });
});
