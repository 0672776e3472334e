import { ApiProperty } from "@nestjs/swagger";
import { IsIn, IsNotEmpty, IsString, MaxLength } from "class-validator";
import { MOVE_ACTIONS, MoveAction } from "../../common/types/status.type";

export class TransitionMoveDto {
  @ApiProperty({ enum: [...MOVE_ACTIONS], example: "approve" })
  @IsIn(MOVE_ACTIONS)
  action!: MoveAction;

  @ApiProperty({ description: "Reviewer making the decision", example: "jane.doe" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  actor!: string;
}

export class FailBatchDto {
  @ApiProperty({ example: "Reservation export was incomplete" })
  @IsString()
  @IsNotEmpty()
  @MaxLength(2000)
  reason!: string;
}
