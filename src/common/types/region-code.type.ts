/**
 * Region Code Types
 *
 * Australian state and territory abbreviations. A region code selects the
 * public and school holiday calendars used for a property.
 */
export const REGION_CODES = [
  "VIC",
  "NSW",
  "QLD",
  "SA",
  "TAS",
  "WA",
  "NT",
  "ACT",
] as const;

export type RegionCode = (typeof REGION_CODES)[number];

export function isRegionCode(value: string): value is RegionCode {
  return REGION_CODES.some((code) => code === value);
}
