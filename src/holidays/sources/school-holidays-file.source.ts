import { Logger } from "@nestjs/common";
import { readFile } from "fs/promises";
import * as path from "path";
import { SchoolHolidaySource } from "./school-holiday-source.interface";
import { RegionCode } from "../../common/types/region-code.type";
import { SchoolHoliday } from "../../common/types/holiday-period.type";
import { isDateOnlyString, yearOf } from "../../common/utils/date.util";
import {
  UpstreamUnavailableError,
  describeError,
} from "../../common/errors/upstream.error";
import { isRecord } from "../../common/utils/validation.util";

/**
 * Shape of the school holiday calendar file:
 *
 * {
 *   "year": 2026,
 *   "terms": [
 *     { "term": "Term 1", "ranges": [{ "state": "VIC", "start": "2026-04-03", "end": "2026-04-19" }] }
 *   ]
 * }
 */
interface SchoolHolidayRange {
  state: string;
  start: string;
  end: string;
}

interface SchoolHolidayTerm {
  term: string;
  ranges: SchoolHolidayRange[];
}

function isSchoolHolidayTerm(value: unknown): value is SchoolHolidayTerm {
  return (
    isRecord(value) &&
    typeof value.term === "string" &&
    Array.isArray(value.ranges) &&
    value.ranges.every(
      (range: unknown) =>
        isRecord(range) &&
        typeof range.state === "string" &&
        typeof range.start === "string" &&
        typeof range.end === "string",
    )
  );
}

/**
 * School holidays from a JSON calendar file maintained by operations staff.
 *
 * A range belongs to a year when it starts or ends in that year, so a
 * summer break crossing New Year is returned for both years.
 */
export class FileSchoolHolidaySource implements SchoolHolidaySource {
  readonly kind = "file";
  private readonly logger = new Logger(FileSchoolHolidaySource.name);
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async getSchoolHolidays(region: RegionCode, year: number): Promise<SchoolHoliday[]> {
    const terms = await this.readTerms();
    const holidays: SchoolHoliday[] = [];

    for (const term of terms) {
      for (const range of term.ranges) {
        if (range.state.toUpperCase() !== region) continue;
        if (!isDateOnlyString(range.start) || !isDateOnlyString(range.end)) {
          this.logger.warn(
            `Skipping ${term.term} ${range.state}: invalid dates ${range.start}..${range.end}`,
          );
          continue;
        }
        if (yearOf(range.start) !== year && yearOf(range.end) !== year) continue;

        holidays.push({
          name: `${term.term} School Holidays`,
          startDate: range.start,
          endDate: range.end,
        });
      }
    }
    return holidays;
  }

  private async readTerms(): Promise<SchoolHolidayTerm[]> {
    let document: unknown;
    try {
      document = JSON.parse(await readFile(this.filePath, "utf-8"));
    } catch (error) {
      throw new UpstreamUnavailableError(
        "school holiday file",
        `cannot read ${this.filePath}: ${describeError(error)}`,
      );
    }

    const terms = isRecord(document) ? document.terms : undefined;
    if (!Array.isArray(terms) || !terms.every(isSchoolHolidayTerm)) {
      throw new UpstreamUnavailableError(
        "school holiday file",
        `${this.filePath} does not contain a "terms" list`,
      );
    }
    return terms;
  }
}
