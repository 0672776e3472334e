/**
 * A holiday calendar source was unreachable, timed out or answered with
 * something that is not a holiday list. Thrown by the API clients and
 * recovered by HolidayPeriodsService as an empty result.
 */
export class UpstreamUnavailableError extends Error {
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`${source}: ${message}`);
    this.name = "UpstreamUnavailableError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
