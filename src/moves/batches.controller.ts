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
import { CreateBatchDto } from "./dto/create-batch.dto";
import { FailBatchDto } from "./dto/transition-move.dto";
import { BatchQueryDto } from "./dto/ledger-query.dto";
import {
  BatchResponseDto,
  CreateBatchResponseDto,
} from "./dto/batch-response.dto";
import { MoveResponseDto } from "./dto/move-response.dto";
import { NoCdnCacheInterceptor } from "../common/interceptors/no-cdn-cache.interceptor";

/**
 * Batches Controller
 *
 * Endpoints:
 * - POST /properties/:code/batches - Create a batch with its candidate moves
 * - GET /batches?propertyCode=&status= - Batches of a property
 * - GET /batches/:id - Batch with progress
 * - GET /batches/:id/moves - Moves of a batch
 * - POST /batches/:id/fail - Mark a pending batch as failed
 */
@ApiTags("batches")
@Controller()
@UseInterceptors(NoCdnCacheInterceptor)
export class BatchesController {
  constructor(private readonly ledger: MoveLedgerService) {}

  @Post("properties/:code/batches")
  @ApiOperation({
    summary: "Create a move batch",
    description:
      "Creates a batch for the property and assigns the candidate moves, tagging each with the holiday period it overlaps.",
  })
  @ApiResponse({ status: 201, type: CreateBatchResponseDto })
  @ApiResponse({ status: 400, description: "Malformed candidate move" })
  @ApiResponse({ status: 404, description: "Property not found or inactive" })
  async createBatch(
    @Param("code") code: string,
    @Body() body: CreateBatchDto,
  ): Promise<CreateBatchResponseDto> {
    const { batch, moves } = await this.ledger.createBatchWithMoves(code, body.moves, {
      createdBy: body.createdBy ?? null,
      analysisDate: body.analysisDate ? new Date(body.analysisDate) : undefined,
    });

    return {
      batchId: batch.id,
      batch: BatchResponseDto.fromEntity(batch),
      moves: moves.map((m) => MoveResponseDto.fromEntity(m)),
    };
  }

  @Get("batches")
  @ApiOperation({ summary: "List batches of a property (newest first)" })
  @ApiResponse({ status: 200, type: [BatchResponseDto] })
  async listBatches(@Query() query: BatchQueryDto): Promise<BatchResponseDto[]> {
    const batches = await this.ledger.listBatches(query.propertyCode, query.status);
    return batches.map((b) => BatchResponseDto.fromEntity(b));
  }

  @Get("batches/:id")
  @ApiOperation({ summary: "Get a batch with its progress" })
  @ApiResponse({ status: 200, type: BatchResponseDto })
  @ApiResponse({ status: 404, description: "Batch not found" })
  async getBatch(@Param("id", ParseUUIDPipe) id: string): Promise<BatchResponseDto> {
    return BatchResponseDto.fromEntity(await this.ledger.getBatch(id));
  }

  @Get("batches/:id/moves")
  @ApiOperation({ summary: "List the moves of a batch in submission order" })
  @ApiResponse({ status: 200, type: [MoveResponseDto] })
  @ApiResponse({ status: 404, description: "Batch not found" })
  async listMoves(@Param("id", ParseUUIDPipe) id: string): Promise<MoveResponseDto[]> {
    const moves = await this.ledger.listMoves(id);
    return moves.map((m) => MoveResponseDto.fromEntity(m));
  }

  @Post("batches/:id/fail")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: "Mark a pending batch as failed" })
  @ApiResponse({ status: 200, type: BatchResponseDto })
  @ApiResponse({ status: 409, description: "Batch is not pending" })
  async failBatch(
    @Param("id", ParseUUIDPipe) id: string,
    @Body() body: FailBatchDto,
  ): Promise<BatchResponseDto> {
    return BatchResponseDto.fromEntity(await this.ledger.failBatch(id, body.reason));
  }
}
