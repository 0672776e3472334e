import { ApiProperty } from "@nestjs/swagger";
import { Property } from "../entities/property.entity";
import { REGION_CODES, RegionCode } from "../../common/types/region-code.type";
import { ClassificationRule } from "../../common/utils/region.util";

export class PropertyResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: "CALI" })
  code!: string;

  @ApiProperty({ example: "Alice Springs Lodge" })
  name!: string;

  @ApiProperty({ nullable: true, description: "Reservation-system property id" })
  externalId!: string | null;

  @ApiProperty({ enum: [...REGION_CODES], nullable: true })
  regionCode!: RegionCode | null;

  @ApiProperty()
  isActive!: boolean;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;

  static fromEntity(property: Property): PropertyResponseDto {
    const dto = new PropertyResponseDto();
    dto.id = property.id;
    dto.code = property.code;
    dto.name = property.name;
    dto.externalId = property.externalId;
    dto.regionCode = property.regionCode;
    dto.isActive = property.isActive;
    dto.createdAt = property.createdAt;
    dto.updatedAt = property.updatedAt;
    return dto;
  }
}

export class ReclassifyPropertyResponseDto {
  @ApiProperty({ type: PropertyResponseDto })
  property!: PropertyResponseDto;

  @ApiProperty({ enum: ["explicit", "keyword", "prefix", "unresolved"] })
  rule!: ClassificationRule;

  @ApiProperty({ description: "Whether the stored region code changed" })
  changed!: boolean;
}
