import { isRecord } from "../../common/utils/validation.util";

export interface OpenHolidaysName {
  language: string;
  text: string;
}

export interface OpenHolidaysSubdivision {
  code: string; // e.g. "AU-VIC"
  shortName: string; // e.g. "VIC"
}

export interface OpenHolidaysEntry {
  id: string;
  startDate: string; // "YYYY-MM-DD"
  endDate: string; // "YYYY-MM-DD"
  type: string;
  name: OpenHolidaysName[];
  regionalScope?: string;
  nationwide: boolean;
  subdivisions?: OpenHolidaysSubdivision[];
  groups?: OpenHolidaysSubdivision[];
}

export function isOpenHolidaysEntry(value: unknown): value is OpenHolidaysEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    typeof value.startDate === "string" &&
    typeof value.endDate === "string" &&
    Array.isArray(value.name) &&
    value.name.every(
      (name: unknown) =>
        isRecord(name) && typeof name.language === "string" && typeof name.text === "string",
    )
  );
}

/**
 * Picks the English name, falling back to the first available one.
 */
export function pickEnglishName(entry: OpenHolidaysEntry): string {
  return (
    entry.name.find((n) => n.language.toUpperCase() === "EN")?.text ||
    entry.name[0]?.text ||
    "School Holidays"
  );
}
