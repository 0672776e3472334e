import { ApiProperty } from "@nestjs/swagger";
import { MoveBatch } from "../entities/move-batch.entity";
import { BATCH_STATUSES, BatchStatus } from "../../common/types/status.type";
import { completionPercentage, isBatchComplete } from "../utils/batch-progress.util";
import { MoveResponseDto } from "./move-response.dto";

/**
 * Batch with its derived progress fields.
 */
export class BatchResponseDto {
  @ApiProperty()
  id!: string;

  @ApiProperty({ example: "CALI" })
  propertyCode!: string;

  @ApiProperty({ nullable: true })
  createdBy!: string | null;

  @ApiProperty({ enum: [...BATCH_STATUSES] })
  status!: BatchStatus;

  @ApiProperty()
  totalMoves!: number;

  @ApiProperty({ description: "Approved moves" })
  processedMoves!: number;

  @ApiProperty()
  rejectedMoves!: number;

  @ApiProperty({ example: 66.7, description: "Decided moves in percent, one decimal" })
  completionPercentage!: number;

  @ApiProperty()
  isComplete!: boolean;

  @ApiProperty({ nullable: true })
  failureReason!: string | null;

  @ApiProperty()
  createdAt!: Date;

  @ApiProperty()
  updatedAt!: Date;

  static fromEntity(batch: MoveBatch): BatchResponseDto {
    const dto = new BatchResponseDto();
    dto.id = batch.id;
    dto.propertyCode = batch.propertyCode;
    dto.createdBy = batch.createdBy;
    dto.status = batch.status;
    dto.totalMoves = batch.totalMoves;
    dto.processedMoves = batch.processedMoves;
    dto.rejectedMoves = batch.rejectedMoves;
    dto.completionPercentage = completionPercentage(batch);
    dto.isComplete = isBatchComplete(batch);
    dto.failureReason = batch.failureReason;
    dto.createdAt = batch.createdAt;
    dto.updatedAt = batch.updatedAt;
    return dto;
  }
}

export class CreateBatchResponseDto {
  @ApiProperty()
  batchId!: string;

  @ApiProperty({ type: BatchResponseDto })
  batch!: BatchResponseDto;

  @ApiProperty({ type: [MoveResponseDto] })
  moves!: MoveResponseDto[];
}

export class TransitionResponseDto {
  @ApiProperty({ type: MoveResponseDto })
  move!: MoveResponseDto;

  @ApiProperty({ type: BatchResponseDto })
  batch!: BatchResponseDto;
}
