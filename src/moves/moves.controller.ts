import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseInterceptors,
} from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import { MoveLedgerService } from "./move-ledger.service";
import { TransitionMoveDto } from "./dto/transition-move.dto";
import { MoveQueryDto } from "./dto/ledger-query.dto";
import { BatchResponseDto, TransitionResponseDto } from "./dto/batch-response.dto";
import { MoveResponseDto } from "./dto/move-response.dto";
import { NoCdnCacheInterceptor } from "../common/interceptors/no-cdn-cache.interceptor";

/**
 * Moves Controller
 *
 * Endpoints:
 * - GET /moves?status=&limit= - Moves in a status across batches
 * - POST /moves/:id/transition - Approve or reject a move
 */
@ApiTags("moves")
@Controller("moves")
@UseInterceptors(NoCdnCacheInterceptor)
export class MovesController {
  constructor(private readonly ledger: MoveLedgerService) {}

  @Get()
  @ApiOperation({ summary: "List moves by status (oldest first)" })
  @ApiResponse({ status: 200, type: [MoveResponseDto] })
  async listByStatus(@Query() query: MoveQueryDto): Promise<MoveResponseDto[]> {
    const moves = await this.ledger.listMovesByStatus(query.status, query.limit);
    return moves.map((m) => MoveResponseDto.fromEntity(m));
  }

  @Post(":id/transition")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Approve or reject a move",
    description:
      "Decides a pending move and updates its batch counters atomically. A move can be decided once.",
  })
  @ApiResponse({ status: 200, type: TransitionResponseDto })
  @ApiResponse({ status: 404, description: "Move not found" })
  @ApiResponse({ status: 409, description: "Move already decided" })
  async transition(
    @Param("id", ParseUUIDPipe) id: string,
    @Body() body: TransitionMoveDto,
  ): Promise<TransitionResponseDto> {
    const { move, batch } = await this.ledger.transitionMove(id, body.action, body.actor);
    return {
      move: MoveResponseDto.fromEntity(move),
      batch: BatchResponseDto.fromEntity(batch),
    };
  }
}
