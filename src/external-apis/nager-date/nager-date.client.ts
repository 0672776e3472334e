import { Injectable, Logger } from "@nestjs/common";
import axios, { AxiosInstance } from "axios";
import { NagerPublicHoliday, isNagerPublicHoliday } from "./nager-date.types";
import { getHolidayConfig } from "../../config/holidays.config";
import {
  UpstreamUnavailableError,
  describeError,
} from "../../common/errors/upstream.error";

/**
 * Nager.Date API Client
 *
 * API: https://date.nager.at/
 *
 * Free public holiday API, no API key required. Regional holidays carry
 * their ISO 3166-2 subdivisions in `counties` (e.g. "AU-VIC").
 */
@Injectable()
export class NagerDateClient {
  private readonly logger = new Logger(NagerDateClient.name);
  private readonly client: AxiosInstance;
  private readonly baseUrl = "https://date.nager.at/api/v3";

  constructor() {
    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: getHolidayConfig().fetchTimeoutMs,
      headers: {
        "User-Agent": "defrag-move-ledger",
        Accept: "application/json",
      },
    });
  }

  /**
   * Get public holidays for a specific country and year
   *
   * GET /api/v3/PublicHolidays/{year}/{countryCode}
   *
   * Entries that do not look like holidays are dropped with a warning.
   *
   * @throws UpstreamUnavailableError on network errors, timeouts, non-2xx
   * responses or a body that is not a list
   */
  async getPublicHolidays(
    year: number,
    countryCode: string,
  ): Promise<NagerPublicHoliday[]> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(
        `/PublicHolidays/${year}/${countryCode}`,
      );
      data = response.data;
    } catch (error) {
      throw new UpstreamUnavailableError(
        "Nager.Date",
        `failed to fetch holidays for ${countryCode} ${year}: ${describeError(error)}`,
      );
    }

    if (!Array.isArray(data)) {
      throw new UpstreamUnavailableError(
        "Nager.Date",
        `unexpected response for ${countryCode} ${year}`,
      );
    }

    const holidays = data.filter(isNagerPublicHoliday);
    if (holidays.length < data.length) {
      this.logger.warn(
        `Dropped ${data.length - holidays.length} malformed holiday entries for ${countryCode} ${year}`,
      );
    }
    return holidays;
  }
}
