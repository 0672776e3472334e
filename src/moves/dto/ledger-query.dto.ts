import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Max, Min } from "class-validator";
import { Type } from "class-transformer";
import {
  BATCH_STATUSES,
  BatchStatus,
  MOVE_STATUSES,
  MoveStatus,
} from "../../common/types/status.type";

export class BatchQueryDto {
  @ApiProperty({ example: "CALI" })
  @IsString()
  @IsNotEmpty()
  propertyCode!: string;

  @ApiPropertyOptional({ enum: [...BATCH_STATUSES] })
  @IsOptional()
  @IsIn(BATCH_STATUSES)
  status?: BatchStatus;
}

export class MoveQueryDto {
  @ApiProperty({ enum: [...MOVE_STATUSES], example: "pending" })
  @IsIn(MOVE_STATUSES)
  status!: MoveStatus;

  @ApiPropertyOptional({ default: 100, maximum: 1000 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number = 100;
}
