import { ApiPropertyOptional } from "@nestjs/swagger";
import { IsOptional, IsString, MaxLength } from "class-validator";

/**
 * Optional region hints for reclassification. Without hints the stored name
 * and code are classified again.
 */
export class ReclassifyPropertyDto {
  @ApiPropertyOptional({ example: "Victoria" })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  state?: string;

  @ApiPropertyOptional({ example: "AU-VIC" })
  @IsOptional()
  @IsString()
  @MaxLength(64)
  region?: string;
}
