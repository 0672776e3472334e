import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
  ArrayMaxSize,
  IsArray,
  IsISO8601,
  IsOptional,
  IsString,
  MaxLength,
} from "class-validator";
import { Type } from "class-transformer";

export class CreateBatchDto {
  @ApiPropertyOptional({ description: "Actor creating the batch", example: "defrag-analyzer" })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  createdBy?: string;

  @ApiPropertyOptional({
    description: "When the analysis ran (ISO 8601, defaults to now)",
    example: "2026-03-20T06:00:00Z",
  })
  @IsOptional()
  @IsISO8601()
  analysisDate?: string;

  @ApiProperty({
    description:
      "Candidate moves in submission order. Each needs startDate and endDate (YYYY-MM-DD, inclusive); details is free-form.",
    example: [
      {
        startDate: "2026-04-03",
        endDate: "2026-04-06",
        details: { reservationId: "R-1001", fromUnit: "12", toUnit: "14" },
      },
    ],
    type: "array",
    items: { type: "object" },
  })
  @IsArray()
  @ArrayMaxSize(5000)
  @Type(() => Object)
  moves!: unknown[];
}
