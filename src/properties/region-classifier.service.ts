import { Injectable, Logger } from "@nestjs/common";
import { RegionCode } from "../common/types/region-code.type";
import {
  ClassifiableRecord,
  RegionResolution,
  resolveRegionCode,
} from "../common/utils/region.util";
import { describeError } from "../common/errors/upstream.error";

/**
 * Region Classifier
 *
 * Resolves the state/territory whose holiday calendars apply to a property.
 * Classification never throws: a record that cannot be read is reported as
 * unresolved and logged.
 */
@Injectable()
export class RegionClassifier {
  private readonly logger = new Logger(RegionClassifier.name);

  classify(record: ClassifiableRecord): RegionCode | null {
    return this.explain(record).regionCode;
  }

  /**
   * Like classify(), but also reports which rule produced the result.
   */
  explain(record: ClassifiableRecord): RegionResolution {
    try {
      return resolveRegionCode(record);
    } catch (error) {
      this.logger.warn(`Could not classify property record: ${describeError(error)}`);
      return { regionCode: null, rule: "unresolved" };
    }
  }

  classifyMany(records: ClassifiableRecord[]): Array<RegionCode | null> {
    return records.map((record) => this.classify(record));
  }
}
