import { Test, TestingModule } from "@nestjs/testing";
import { RegionClassifier } from "./region-classifier.service";
import { ClassifiableRecord } from "../common/utils/region.util";

describe("RegionClassifier", () => {
  let classifier: RegionClassifier;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [RegionClassifier],
    }).compile();

    classifier = module.get<RegionClassifier>(RegionClassifier);
  });

  const unreadableRecord = (): ClassifiableRecord => ({
    code: "VBAD",
    get name(): unknown {
      throw new Error("name is not readable");
    },
  });

  it("should classify a record with an explicit state", () => {
    expect(classifier.classify({ code: "ZZZ", state: "au-nsw" })).toBe("NSW");
  });

  it("should explain which rule matched", () => {
    expect(classifier.explain({ code: "ZZZ", name: "Noosa Beach Houses" })).toEqual({
      regionCode: "QLD",
      rule: "keyword",
    });
  });

  it("should report an unreadable record as unresolved", () => {
    expect(classifier.explain(unreadableRecord())).toEqual({
      regionCode: null,
      rule: "unresolved",
    });
  });

  it("should classify records independently", () => {
    expect(
      classifier.classifyMany([
        { region: "vic" },
        unreadableRecord(),
        { code: "WX1", name: "Somewhere" },
      ]),
    ).toEqual(["VIC", null, "WA"]);
  });
});
