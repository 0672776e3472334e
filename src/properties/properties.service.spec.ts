import { Test, TestingModule } from "@nestjs/testing";
import { getRepositoryToken } from "@nestjs/typeorm";
import { PropertiesService, normalizePropertyCode } from "./properties.service";
import { RegionClassifier } from "./region-classifier.service";
import { Property } from "./entities/property.entity";
import { LedgerNotFoundError } from "../common/errors/ledger.errors";
import { InMemoryDataSource } from "../../test/mocks/in-memory-data-source";
import { createTestProperty } from "../../test/fixtures/property.fixtures";

describe("PropertiesService", () => {
  let service: PropertiesService;
  let dataSource: InMemoryDataSource;

  beforeEach(async () => {
    dataSource = new InMemoryDataSource();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PropertiesService,
        RegionClassifier,
        {
          provide: getRepositoryToken(Property),
          useValue: dataSource.getRepository(Property),
        },
      ],
    }).compile();

    service = module.get<PropertiesService>(PropertiesService);
  });

  describe("normalizePropertyCode", () => {
    it("should trim and upper-case", () => {
      expect(normalizePropertyCode("  cali ")).toBe("CALI");
    });
  });

  describe("ingest", () => {
    it("should create properties and classify their regions", async () => {
      const results = await service.ingest([
        { code: "cali", name: "  Alice Springs Lodge " },
        { code: "VKIR", name: "Kangaroo Island Retreat", state: "Unknown" },
        { code: "ZZZ1", name: "Nowhere Cabins", externalId: 4711 },
      ]);

      expect(results).toEqual([
        { index: 0, code: "CALI", status: "created", regionCode: "NT", rule: "keyword" },
        { index: 1, code: "VKIR", status: "created", regionCode: "SA", rule: "keyword" },
        { index: 2, code: "ZZZ1", status: "created", regionCode: null, rule: "unresolved" },
      ]);

      const rows = dataSource.rows(Property);
      expect(rows).toHaveLength(3);
      expect(rows[0]).toMatchObject({
        code: "CALI",
        name: "Alice Springs Lodge",
        externalId: null,
        isActive: true,
      });
      expect(rows[2].externalId).toBe("4711");
    });

    it("should skip invalid records without affecting the others", async () => {
      const results = await service.ingest([
        { code: "CALI" },
        "not-an-object",
        { code: "bad code!", name: "Broken" },
        { code: "VMEL", name: "Melbourne CBD Apartments" },
      ]);

      expect(results.map((r) => [r.code, r.status])).toEqual([
        ["CALI", "skipped"],
        [null, "skipped"],
        ["BAD CODE!", "skipped"],
        ["VMEL", "created"],
      ]);
      expect(results[0].errors).toContain("name must be a string");
      expect(results[1].errors).toEqual(["value must be an object"]);
      expect(results[2].errors).toEqual([
        "code may only contain letters, digits, '-' and '_'",
      ]);
      expect(dataSource.rows(Property).map((p) => p.code)).toEqual(["VMEL"]);
    });

    it("should keep the stored region when a record cannot be classified", async () => {
      await dataSource.seed(
        Property,
        createTestProperty({
          code: "ZZZ1",
          name: "Old Name",
          regionCode: "VIC",
          externalId: "ext-1",
        }),
      );

      const [result] = await service.ingest([
        { code: "zzz1", name: "Nowhere Cabins", isActive: false },
      ]);

      expect(result).toEqual({
        index: 0,
        code: "ZZZ1",
        status: "updated",
        regionCode: "VIC",
        rule: "unresolved",
      });
      expect(dataSource.rows(Property)[0]).toMatchObject({
        name: "Nowhere Cabins",
        externalId: "ext-1",
        regionCode: "VIC",
        isActive: false,
      });
    });

    it("should report a failed save and continue", async () => {
      dataSource.failNext("save", new Error("connection reset"));

      const results = await service.ingest([
        { code: "CALI", name: "Alice Springs Lodge" },
        { code: "VKIR", name: "Kangaroo Island Retreat" },
      ]);

      expect(results[0]).toEqual({
        index: 0,
        code: "CALI",
        status: "failed",
        regionCode: null,
        rule: "keyword",
        errors: ["connection reset"],
      });
      expect(results[1].status).toBe("created");
      expect(dataSource.rows(Property).map((p) => p.code)).toEqual(["VKIR"]);
    });
  });

  describe("reclassify", () => {
    it("should correct a stored region from the name", async () => {
      await dataSource.seed(
        Property,
        createTestProperty({ name: "Alice Springs Lodge", regionCode: "VIC" }),
      );

      const result = await service.reclassify("cali");

      expect(result.rule).toBe("keyword");
      expect(result.changed).toBe(true);
      expect(result.property.regionCode).toBe("NT");
      expect(dataSource.rows(Property)[0].regionCode).toBe("NT");
    });

    it("should prefer an explicit hint", async () => {
      await dataSource.seed(Property, createTestProperty({ name: "Alice Springs Lodge" }));

      const result = await service.reclassify("CALI", { state: "South Australia" });

      expect(result).toMatchObject({ rule: "explicit", changed: true });
      expect(result.property.regionCode).toBe("SA");
    });

    it("should keep the stored region when unresolved", async () => {
      await dataSource.seed(
        Property,
        createTestProperty({ code: "ZZZ1", name: "Nowhere", regionCode: "QLD" }),
      );

      const result = await service.reclassify("ZZZ1");

      expect(result).toMatchObject({ rule: "unresolved", changed: false });
      expect(result.property.regionCode).toBe("QLD");
    });
  });

  describe("deactivate", () => {
    it("should be idempotent and hide the property from the active list", async () => {
      await dataSource.seed(Property, createTestProperty());
      await dataSource.seed(Property, createTestProperty({ code: "VMEL", regionCode: "VIC" }));

      expect((await service.deactivate("CALI")).isActive).toBe(false);
      expect((await service.deactivate("CALI")).isActive).toBe(false);

      expect((await service.list()).map((p) => p.code)).toEqual(["VMEL"]);
      expect((await service.list(false)).map((p) => p.code)).toEqual(["CALI", "VMEL"]);
    });
  });

  describe("findByCode", () => {
    it("should throw LedgerNotFoundError for an unknown code", async () => {
      await expect(service.findByCode("nope")).rejects.toThrow(LedgerNotFoundError);
      await expect(service.findByCode("nope")).rejects.toThrow('Property "NOPE" not found');
    });
  });
});
