import { ApiProperty } from "@nestjs/swagger";
import { DefragMove } from "../entities/defrag-move.entity";
import { MOVE_STATUSES, MoveStatus } from "../../common/types/status.type";
import {
  HolidayImportance,
  HolidayPeriodType,
} from "../../common/types/holiday-period.type";

export class MoveHolidayTagDto {
  @ApiProperty({ example: "Good Friday / Easter Saturday / Easter Sunday / Easter Monday" })
  periodName!: string;

  @ApiProperty({ enum: ["public", "school"] })
  type!: HolidayPeriodType;

  @ApiProperty({ enum: ["high", "medium", "low"] })
  importance!: HolidayImportance;
}

export class MoveResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ nullable: true })
  batchId!: string | null;

  @ApiProperty({ example: "CALI" })
  propertyCode!: string;

  @ApiProperty()
  sequence!: number;

  @ApiProperty()
  analysisDate!: Date;

  @ApiProperty({
    description: "Move document: startDate, endDate and free-form details",
    type: "object",
    additionalProperties: true,
  })
  moveData!: Record<string, unknown>;

  @ApiProperty({ enum: [...MOVE_STATUSES] })
  status!: MoveStatus;

  @ApiProperty()
  isProcessed!: boolean;

  @ApiProperty()
  isRejected!: boolean;

  @ApiProperty({ nullable: true })
  suggestedBy!: string | null;

  @ApiProperty({ nullable: true })
  approvedBy!: string | null;

  @ApiProperty({ nullable: true })
  approvedAt!: Date | null;

  @ApiProperty({ nullable: true })
  rejectedBy!: string | null;

  @ApiProperty({ nullable: true })
  rejectedAt!: Date | null;

  @ApiProperty({ nullable: true })
  processedBy!: string | null;

  @ApiProperty({ nullable: true })
  processedAt!: Date | null;

  @ApiProperty()
  isHolidayMove!: boolean;

  @ApiProperty({ type: MoveHolidayTagDto, nullable: true })
  holiday!: MoveHolidayTagDto | null;

  static fromEntity(move: DefragMove): MoveResponseDto {
    const dto = new MoveResponseDto();
    dto.id = move.id;
    dto.batchId = move.batchId;
    dto.propertyCode = move.propertyCode;
    dto.sequence = move.sequence;
    dto.analysisDate = move.analysisDate;
    dto.moveData = { ...move.moveData };
    dto.status = move.status;
    dto.isProcessed = move.isProcessed;
    dto.isRejected = move.isRejected;
    dto.suggestedBy = move.suggestedBy;
    dto.approvedBy = move.approvedBy;
    dto.approvedAt = move.approvedAt;
    dto.rejectedBy = move.rejectedBy;
    dto.rejectedAt = move.rejectedAt;
    dto.processedBy = move.processedBy;
    dto.processedAt = move.processedAt;
    dto.isHolidayMove = move.isHolidayMove;
    dto.holiday =
      move.isHolidayMove && move.holidayPeriodName && move.holidayType && move.holidayImportance
        ? {
            periodName: move.holidayPeriodName,
            type: move.holidayType,
            importance: move.holidayImportance,
          }
        : null;
    return dto;
  }
}
