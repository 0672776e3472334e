import { ApiProperty } from "@nestjs/swagger";
import { ArrayMaxSize, IsArray } from "class-validator";
import { Type } from "class-transformer";
import { REGION_CODES, RegionCode } from "../../common/types/region-code.type";
import { ClassificationRule } from "../../common/utils/region.util";

export class IngestPropertiesDto {
  @ApiProperty({
    description:
      "Property records. Each needs code and name; region hints (state, stateCode, region, regionCode) are optional.",
    example: [
      { code: "CALI", name: "Alice Springs Lodge", state: "NT" },
      { code: "VMEL", name: "Melbourne CBD Apartments" },
    ],
    type: "array",
    items: { type: "object" },
  })
  @IsArray()
  @ArrayMaxSize(1000)
  @Type(() => Object)
  records!: unknown[];
}

export type IngestOutcomeStatus = "created" | "updated" | "skipped" | "failed";

export class PropertyIngestResultDto {
  @ApiProperty({ description: "Record index in the request", example: 0 })
  index!: number;

  @ApiProperty({ nullable: true, example: "CALI" })
  code!: string | null;

  @ApiProperty({ enum: ["created", "updated", "skipped", "failed"] })
  status!: IngestOutcomeStatus;

  @ApiProperty({ enum: [...REGION_CODES], nullable: true })
  regionCode!: RegionCode | null;

  @ApiProperty({ enum: ["explicit", "keyword", "prefix", "unresolved"], nullable: true })
  rule!: ClassificationRule | null;

  @ApiProperty({ type: [String], required: false })
  errors?: string[];
}

export class IngestPropertiesResponseDto {
  @ApiProperty({ type: [PropertyIngestResultDto] })
  results!: PropertyIngestResultDto[];

  @ApiProperty({ example: 2 })
  ingested!: number;

  @ApiProperty({ example: 0 })
  skipped!: number;
}
