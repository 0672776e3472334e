import {
  IsBoolean,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from "class-validator";
import { Type } from "class-transformer";

/**
 * One property record from an ingestion feed.
 *
 * Only code and name are required. Region hints are left untyped: feeds
 * disagree on both field names and formats, and the RegionClassifier reads
 * them defensively.
 */
export class PropertyRecordDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(32)
  @Matches(/^[A-Za-z0-9_-]+$/, {
    message: "code may only contain letters, digits, '-' and '_'",
  })
  code!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  name!: string;

  @IsOptional()
  @Type(() => String)
  @IsString()
  externalId?: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;

  state?: unknown;
  stateCode?: unknown;
  region?: unknown;
  regionCode?: unknown;
}
