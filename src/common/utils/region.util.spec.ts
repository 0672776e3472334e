import {
  normalizeRegionCode,
  regionFromCodePrefix,
  regionFromName,
  resolveRegionCode,
} from "./region.util";

describe("region.util", () => {
  describe("normalizeRegionCode", () => {
    it("should strip the country prefix and upper-case", () => {
      expect(normalizeRegionCode("au-qld")).toBe("QLD");
      expect(normalizeRegionCode(" nsw ")).toBe("NSW");
    });

    it("should map long names to codes", () => {
      expect(normalizeRegionCode("Victoria")).toBe("VIC");
      expect(normalizeRegionCode("australian capital territory")).toBe("ACT");
    });

    it("should return null for unknown or non-string values", () => {
      expect(normalizeRegionCode("Bavaria")).toBeNull();
      expect(normalizeRegionCode("")).toBeNull();
      expect(normalizeRegionCode(42)).toBeNull();
      expect(normalizeRegionCode(null)).toBeNull();
    });
  });

  describe("regionFromName", () => {
    it("should find a place name anywhere in the name", () => {
      expect(regionFromName("Alice Springs Desert Resort")).toBe("NT");
      expect(regionFromName("The Hobart Waterfront")).toBe("TAS");
    });

    it("should ignore case", () => {
      expect(regionFromName("BYRON BAY BEACHFRONT")).toBe("NSW");
    });

    it("should let the earlier table entry win", () => {
      // Melbourne is listed before Sydney
      expect(regionFromName("Sydney to Melbourne Transit Motel")).toBe("VIC");
    });

    it("should only match whole words", () => {
      expect(regionFromName("Perthshire Cottage")).toBeNull();
    });

    it("should return null without a usable name", () => {
      expect(regionFromName("Nowhere")).toBeNull();
      expect(regionFromName("   ")).toBeNull();
      expect(regionFromName(undefined)).toBeNull();
    });
  });

  describe("regionFromCodePrefix", () => {
    it("should map the first character of the code", () => {
      expect(regionFromCodePrefix("vmel")).toBe("VIC");
      expect(regionFromCodePrefix("CALI")).toBe("NT");
      expect(regionFromCodePrefix("W001")).toBe("WA");
    });

    it("should return null for unmapped prefixes", () => {
      expect(regionFromCodePrefix("ZZZ")).toBeNull();
      expect(regionFromCodePrefix("")).toBeNull();
      expect(regionFromCodePrefix(7)).toBeNull();
    });
  });

  describe("resolveRegionCode", () => {
    it("should use an explicit region field", () => {
      expect(resolveRegionCode({ region: "VIC" })).toEqual({
        regionCode: "VIC",
        rule: "explicit",
      });
    });

    it("should resolve from a place name", () => {
      expect(resolveRegionCode({ name: "Alice Springs", code: "CASP" })).toEqual({
        regionCode: "NT",
        rule: "keyword",
      });
    });

    it("should report unresolved records", () => {
      expect(resolveRegionCode({ name: "Nowhere", code: "ZZZ" })).toEqual({
        regionCode: null,
        rule: "unresolved",
      });
    });

    it("should prefer explicit fields over the name", () => {
      expect(
        resolveRegionCode({ state: "WA", name: "Sydney Harbour View" }).regionCode,
      ).toBe("WA");
    });

    it("should prefer the name over the code prefix", () => {
      expect(resolveRegionCode({ name: "Kangaroo Island Retreat", code: "VKIR" })).toEqual({
        regionCode: "SA",
        rule: "keyword",
      });
    });

    it("should check explicit fields in order", () => {
      expect(resolveRegionCode({ state: "Tasmania", regionCode: "QLD" }).regionCode).toBe(
        "TAS",
      );
    });

    it("should fall through an unrecognised explicit value", () => {
      expect(resolveRegionCode({ state: "Unknown", name: "Hobart Waterfront" })).toEqual({
        regionCode: "TAS",
        rule: "keyword",
      });
    });

    it("should fall back to the code prefix", () => {
      expect(resolveRegionCode({ name: "Beach House", code: "QBH1" })).toEqual({
        regionCode: "QLD",
        rule: "prefix",
      });
    });
  });
});
