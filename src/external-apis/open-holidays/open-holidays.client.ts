import { Injectable, Logger } from "@nestjs/common";
import axios, { AxiosInstance } from "axios";
import { OpenHolidaysEntry, isOpenHolidaysEntry } from "./open-holidays.types";
import { getHolidayConfig } from "../../config/holidays.config";
import {
  UpstreamUnavailableError,
  describeError,
} from "../../common/errors/upstream.error";

/**
 * OpenHolidays API Client
 *
 * API: https://openholidaysapi.org
 * Swagger: https://openholidaysapi.org/swagger/index.html
 *
 * Provides school holiday ranges per country subdivision.
 */
@Injectable()
export class OpenHolidaysClient {
  private readonly logger = new Logger(OpenHolidaysClient.name);
  private readonly client: AxiosInstance;
  private readonly baseUrl = "https://openholidaysapi.org";

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
   * Get school holidays for a subdivision and date range
   *
   * GET /SchoolHolidays?countryIsoCode=AU&subdivisionCode=AU-VIC&validFrom=...&validTo=...
   *
   * @param countryIsoCode - ISO 3166-1 alpha-2 code (e.g., "AU")
   * @param subdivisionCode - ISO 3166-2 code (e.g., "AU-VIC")
   * @param validFrom - Start date (YYYY-MM-DD)
   * @param validTo - End date (YYYY-MM-DD)
   * @throws UpstreamUnavailableError when the API cannot be reached or
   * answers with something other than a list
   */
  async getSchoolHolidays(
    countryIsoCode: string,
    subdivisionCode: string,
    validFrom: string,
    validTo: string,
  ): Promise<OpenHolidaysEntry[]> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>("/SchoolHolidays", {
        params: {
          countryIsoCode,
          subdivisionCode,
          languageIsoCode: "EN",
          validFrom,
          validTo,
        },
      });
      data = response.data;
    } catch (error) {
      throw new UpstreamUnavailableError(
        "OpenHolidays",
        `failed to fetch school holidays for ${subdivisionCode}: ${describeError(error)}`,
      );
    }

    if (!Array.isArray(data)) {
      throw new UpstreamUnavailableError(
        "OpenHolidays",
        `unexpected response for ${subdivisionCode}`,
      );
    }

    const entries = data.filter(isOpenHolidaysEntry);
    if (entries.length < data.length) {
      this.logger.warn(
        `Dropped ${data.length - entries.length} malformed school holiday entries for ${subdivisionCode}`,
      );
    }
    return entries;
  }
}
