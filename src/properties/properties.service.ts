import { Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { Repository } from "typeorm";
import { Property } from "./entities/property.entity";
import { RegionClassifier } from "./region-classifier.service";
import { PropertyRecordDto } from "./dto/property-record.dto";
import { PropertyIngestResultDto } from "./dto/ingest-properties.dto";
import { ReclassifyPropertyDto } from "./dto/reclassify-property.dto";
import { ClassificationRule } from "../common/utils/region.util";
import { validatePlain } from "../common/utils/validation.util";
import { LedgerNotFoundError } from "../common/errors/ledger.errors";
import { describeError } from "../common/errors/upstream.error";

export function normalizePropertyCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Property Registry
 *
 * Upserts properties from ingestion feeds and keeps their region code in
 * sync with the RegionClassifier. Properties are never deleted.
 */
@Injectable()
export class PropertiesService {
  private readonly logger = new Logger(PropertiesService.name);

  constructor(
    @InjectRepository(Property)
    private readonly propertyRepository: Repository<Property>,
    private readonly regionClassifier: RegionClassifier,
  ) {}

  /**
   * Upserts property records by code.
   *
   * Each record is validated, classified and saved on its own: an invalid
   * record is reported as "skipped", a failed save as "failed", and neither
   * affects the others. A region code is only written when classification
   * resolves, so an unresolved record keeps its previous region.
   */
  async ingest(records: unknown[]): Promise<PropertyIngestResultDto[]> {
    const results: PropertyIngestResultDto[] = [];

    for (const [index, raw] of records.entries()) {
      const outcome = validatePlain(PropertyRecordDto, raw);
      if (!outcome.ok) {
        results.push({
          index,
          code: this.peekCode(raw),
          status: "skipped",
          regionCode: null,
          rule: null,
          errors: outcome.errors,
        });
        continue;
      }

      const record = outcome.value;
      const code = normalizePropertyCode(record.code);
      const resolution = this.regionClassifier.explain({ ...record, code });

      try {
        let property = await this.propertyRepository.findOne({ where: { code } });
        const status = property ? "updated" : "created";
        if (!property) {
          property = this.propertyRepository.create({ code, regionCode: null });
        }

        property.name = record.name.trim();
        property.externalId = record.externalId ?? property.externalId ?? null;
        property.isActive = record.isActive ?? true;
        if (resolution.regionCode) {
          property.regionCode = resolution.regionCode;
        }

        const saved = await this.propertyRepository.save(property);
        results.push({
          index,
          code,
          status,
          regionCode: saved.regionCode,
          rule: resolution.rule,
        });
      } catch (error) {
        this.logger.error(`Failed to save property ${code}: ${describeError(error)}`);
        results.push({
          index,
          code,
          status: "failed",
          regionCode: null,
          rule: resolution.rule,
          errors: [describeError(error)],
        });
      }
    }

    const ingested = results.filter((r) => r.status === "created" || r.status === "updated");
    this.logger.log(
      `Ingested ${ingested.length}/${records.length} properties (${
        ingested.filter((r) => r.regionCode === null).length
      } without region)`,
    );
    return results;
  }

  /**
   * Reruns the classifier for a stored property.
   *
   * The stored region code is not treated as an explicit hint, otherwise a
   * wrong classification could never be corrected. When the classifier
   * cannot resolve a region the stored code is kept.
   *
   * @throws LedgerNotFoundError if the property does not exist
   */
  async reclassify(
    code: string,
    hints: ReclassifyPropertyDto = {},
  ): Promise<{ property: Property; rule: ClassificationRule; changed: boolean }> {
    const property = await this.findByCode(code);
    const resolution = this.regionClassifier.explain({
      code: property.code,
      name: property.name,
      state: hints.state,
      region: hints.region,
    });

    const changed =
      resolution.regionCode !== null && resolution.regionCode !== property.regionCode;
    if (changed) {
      this.logger.log(
        `Property ${property.code}: region ${property.regionCode ?? "none"} -> ${resolution.regionCode} (${resolution.rule})`,
      );
      property.regionCode = resolution.regionCode;
      return {
        property: await this.propertyRepository.save(property),
        rule: resolution.rule,
        changed,
      };
    }

    return { property, rule: resolution.rule, changed };
  }

  /**
   * Marks a property inactive. Idempotent. Existing batches are unaffected;
   * new batches are refused.
   */
  async deactivate(code: string): Promise<Property> {
    const property = await this.findByCode(code);
    if (!property.isActive) {
      return property;
    }
    property.isActive = false;
    return this.propertyRepository.save(property);
  }

  /**
   * @throws LedgerNotFoundError if no property has this code
   */
  async findByCode(code: string): Promise<Property> {
    const normalized = normalizePropertyCode(code);
    const property = await this.propertyRepository.findOne({
      where: { code: normalized },
    });
    if (!property) {
      throw new LedgerNotFoundError("property", normalized);
    }
    return property;
  }

  async list(activeOnly = true): Promise<Property[]> {
    return this.propertyRepository.find({
      where: activeOnly ? { isActive: true } : {},
      order: { code: "ASC" },
    });
  }

  private peekCode(raw: unknown): string | null {
    if (typeof raw === "object" && raw !== null && "code" in raw) {
      return typeof raw.code === "string" ? normalizePropertyCode(raw.code) : null;
    }
    return null;
  }
}
