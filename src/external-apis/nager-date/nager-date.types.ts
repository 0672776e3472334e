import { isRecord } from "../../common/utils/validation.util";

/**
 * Nager.Date API Types
 *
 * API Documentation: https://date.nager.at/Api
 */

/**
 * Public Holiday Response
 *
 * GET /api/v3/PublicHolidays/{year}/{countryCode}
 */
export interface NagerPublicHoliday {
  /**
   * Holiday date (ISO 8601 format: YYYY-MM-DD)
   */
  date: string;

  /**
   * Local holiday name (in country's language)
   */
  localName: string;

  /**
   * English holiday name
   */
  name: string;

  countryCode: string;

  /**
   * Is this a global/nationwide holiday?
   * False for regional holidays
   */
  global: boolean;

  /**
   * ISO 3166-2 region codes (if regional holiday)
   * Example: ["AU-VIC", "AU-TAS"]
   */
  counties: string[] | null;

  types: string[];
}

export function isNagerPublicHoliday(value: unknown): value is NagerPublicHoliday {
  if (!isRecord(value)) return false;
  const { counties } = value;
  return (
    typeof value.date === "string" &&
    typeof value.name === "string" &&
    typeof value.global === "boolean" &&
    (counties === null ||
      counties === undefined ||
      (Array.isArray(counties) && counties.every((county) => typeof county === "string")))
  );
}
