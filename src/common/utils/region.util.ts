import { RegionCode, isRegionCode } from "../types/region-code.type";
import regionKeywords from "../constants/region-keywords.json";

/**
 * Region Code Utilities
 *
 * Resolves an Australian state/territory code from property records that
 * come from several upstream systems, each with its own idea of where the
 * state lives (a dedicated field, the display name, or only the code).
 */

/**
 * Long names and non-standard spellings seen in property feeds.
 * Maps alias -> canonical code.
 */
const REGION_ALIASES: Record<string, RegionCode> = {
  VICTORIA: "VIC",
  "NEW SOUTH WALES": "NSW",
  QUEENSLAND: "QLD",
  "SOUTH AUSTRALIA": "SA",
  TASMANIA: "TAS",
  "WESTERN AUSTRALIA": "WA",
  "NORTHERN TERRITORY": "NT",
  "AUSTRALIAN CAPITAL TERRITORY": "ACT",
  QL: "QLD",
  TA: "TAS",
};

/**
 * First character of a property code -> region.
 * Property codes in the reservation system are prefixed by state by convention;
 * "C" is used for the Centre (Northern Territory).
 */
const CODE_PREFIX_REGIONS: Record<string, RegionCode> = {
  V: "VIC",
  N: "NSW",
  Q: "QLD",
  S: "SA",
  T: "TAS",
  W: "WA",
  C: "NT",
};

/** Fields checked for an explicit region, in priority order */
const EXPLICIT_REGION_FIELDS = ["state", "stateCode", "region", "regionCode"] as const;

export type ClassificationRule = "explicit" | "keyword" | "prefix" | "unresolved";

export interface RegionResolution {
  regionCode: RegionCode | null;
  rule: ClassificationRule;
}

/**
 * A property record as received from ingestion. Every field is optional and
 * untyped: feeds disagree on both names and types.
 */
export interface ClassifiableRecord {
  code?: unknown;
  name?: unknown;
  state?: unknown;
  stateCode?: unknown;
  region?: unknown;
  regionCode?: unknown;
}

interface KeywordRule {
  keyword: string;
  region: RegionCode;
  pattern: RegExp;
}

const KEYWORD_RULES: readonly KeywordRule[] = regionKeywords.flatMap((entry) =>
  isRegionCode(entry.region)
    ? [
        {
          keyword: entry.keyword,
          region: entry.region,
          pattern: new RegExp(`\\b${escapeRegExp(entry.keyword)}\\b`, "i"),
        },
      ]
    : [],
);

/**
 * Normalizes a region code by:
 * 1. Trimming and upper-casing
 * 2. Dropping a country prefix ("AU-VIC" -> "VIC")
 * 3. Applying aliases for long names
 *
 * @returns The canonical code, or null when the value is not a known region
 *
 * @example
 * normalizeRegionCode("au-qld") // "QLD"
 * normalizeRegionCode("Victoria") // "VIC"
 * normalizeRegionCode("Bavaria") // null
 */
export function normalizeRegionCode(value: unknown): RegionCode | null {
  if (typeof value !== "string") return null;
  const upper = value.trim().toUpperCase();
  if (!upper) return null;
  const shortCode = upper.startsWith("AU-") ? upper.slice(3) : upper;
  if (isRegionCode(shortCode)) return shortCode;
  return REGION_ALIASES[shortCode] ?? null;
}

/**
 * Finds the first keyword rule contained in a free-text property name.
 * Table order is priority order.
 */
export function regionFromName(name: unknown): RegionCode | null {
  if (typeof name !== "string" || !name.trim()) return null;
  const match = KEYWORD_RULES.find((rule) => rule.pattern.test(name));
  return match ? match.region : null;
}

export function regionFromCodePrefix(code: unknown): RegionCode | null {
  if (typeof code !== "string") return null;
  const first = code.trim().charAt(0).toUpperCase();
  return CODE_PREFIX_REGIONS[first] ?? null;
}

/**
 * Resolves a region for a property record.
 *
 * Priority: explicit region field, then place-name keyword in the name, then
 * the property code prefix. Pure and deterministic.
 */
export function resolveRegionCode(record: ClassifiableRecord): RegionResolution {
  for (const field of EXPLICIT_REGION_FIELDS) {
    const explicit = normalizeRegionCode(record[field]);
    if (explicit) return { regionCode: explicit, rule: "explicit" };
  }

  const fromName = regionFromName(record.name);
  if (fromName) return { regionCode: fromName, rule: "keyword" };

  const fromPrefix = regionFromCodePrefix(record.code);
  if (fromPrefix) return { regionCode: fromPrefix, rule: "prefix" };

  return { regionCode: null, rule: "unresolved" };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
