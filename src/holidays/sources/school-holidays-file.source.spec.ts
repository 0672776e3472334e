import * as path from "path";
import { FileSchoolHolidaySource } from "./school-holidays-file.source";
import { UpstreamUnavailableError } from "../../common/errors/upstream.error";

const FIXTURE = path.join(__dirname, "../../../test/fixtures/school-holidays.json");

describe("FileSchoolHolidaySource", () => {
  const source = new FileSchoolHolidaySource(FIXTURE);

  it("should return the ranges of one state and year", async () => {
    expect(await source.getSchoolHolidays("VIC", 2026)).toEqual([
      { name: "Term 1 School Holidays", startDate: "2026-04-03", endDate: "2026-04-19" },
      { name: "Term 2 School Holidays", startDate: "2026-06-27", endDate: "2026-07-12" },
      { name: "Summer School Holidays", startDate: "2026-12-19", endDate: "2027-01-26" },
    ]);
  });

  it("should list a range crossing New Year under both years", async () => {
    expect(await source.getSchoolHolidays("VIC", 2027)).toEqual([
      { name: "Summer School Holidays", startDate: "2026-12-19", endDate: "2027-01-26" },
    ]);
  });

  it("should skip ranges with invalid dates", async () => {
    expect(await source.getSchoolHolidays("NT", 2026)).toEqual([
      { name: "Term 1 School Holidays", startDate: "2026-04-03", endDate: "2026-04-12" },
    ]);
  });

  it("should throw UpstreamUnavailableError for a missing file", async () => {
    const missing = new FileSchoolHolidaySource(path.join(__dirname, "no-such-file.json"));

    await expect(missing.getSchoolHolidays("VIC", 2026)).rejects.toThrow(
      UpstreamUnavailableError,
    );
  });

  it("should throw UpstreamUnavailableError for a file without terms", async () => {
    const wrongShape = new FileSchoolHolidaySource(
      path.join(__dirname, "../../../package.json"),
    );

    await expect(wrongShape.getSchoolHolidays("VIC", 2026)).rejects.toThrow(
      'does not contain a "terms" list',
    );
  });
});
