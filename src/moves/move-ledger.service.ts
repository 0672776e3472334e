import { HttpException, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { DataSource, EntityManager, QueryFailedError, Repository } from "typeorm";
import { MoveBatch } from "./entities/move-batch.entity";
import { DefragMove } from "./entities/defrag-move.entity";
import { Property } from "../properties/entities/property.entity";
import {
  PropertiesService,
  normalizePropertyCode,
} from "../properties/properties.service";
import { HolidayPeriodsService } from "../holidays/holiday-periods.service";
import { HolidayPeriod } from "../common/types/holiday-period.type";
import {
  BatchStatus,
  MOVE_ACTIONS,
  MoveAction,
  MoveStatus,
} from "../common/types/status.type";
import {
  LedgerNotFoundError,
  LedgerValidationError,
  PersistenceError,
  StateConflictError,
} from "../common/errors/ledger.errors";
import { describeError } from "../common/errors/upstream.error";
import { getLedgerConfig } from "../config/ledger.config";
import { getHolidayConfig } from "../config/holidays.config";
import { formatInRegionTimezone } from "../common/utils/date.util";
import {
  MoveDocument,
  moveDateRange,
  parseMoveDocuments,
} from "./utils/move-document.util";
import { holidayTagFor } from "./utils/holiday-tag.util";
import { decidedMoves, deriveBatchStatus } from "./utils/batch-progress.util";

/** Postgres SQLSTATE codes the ledger reacts to */
const PG_LOCK_NOT_AVAILABLE = "55P03";
const PG_SERIALIZATION_FAILURE = "40001";
const PG_DEADLOCK_DETECTED = "40P01";

/** Columns written by an approve or reject decision */
type MoveDecision = Partial<
  Pick<
    DefragMove,
    | "status"
    | "isProcessed"
    | "isRejected"
    | "approvedBy"
    | "approvedAt"
    | "processedBy"
    | "processedAt"
    | "rejectedBy"
    | "rejectedAt"
  >
>;

export interface MoveTransitionResult {
  move: DefragMove;
  batch: MoveBatch;
}

export interface BatchWithMoves {
  batch: MoveBatch;
  moves: DefragMove[];
}

export interface CreateBatchOptions {
  createdBy?: string | null;
  /** When the analysis ran; defaults to now */
  analysisDate?: Date;
}

/**
 * Move Batch Ledger
 *
 * Drives defragmentation moves from suggestion to decision and keeps the
 * per-batch counters exact under concurrent reviewers.
 *
 * Every write runs in one DataSource.transaction() with a local lock
 * timeout. Move decisions lock the move row, update it conditionally
 * (WHERE not yet decided) and bump the batch counter with a SQL increment,
 * so two reviewers racing on the same move produce exactly one decision and
 * one increment. Holiday periods are looked up before a transaction opens:
 * the lookup may hit the network and must not hold a pooled connection.
 */
@Injectable()
export class MoveLedgerService {
  private readonly logger = new Logger(MoveLedgerService.name);
  private readonly ledgerConfig = getLedgerConfig();
  private readonly holidayConfig = getHolidayConfig();

  constructor(
    private readonly dataSource: DataSource,
    @InjectRepository(MoveBatch)
    private readonly batchRepository: Repository<MoveBatch>,
    @InjectRepository(DefragMove)
    private readonly moveRepository: Repository<DefragMove>,
    private readonly propertiesService: PropertiesService,
    private readonly holidayPeriodsService: HolidayPeriodsService,
  ) {}

  /**
   * Opens an empty batch for an active property.
   *
   * @throws LedgerNotFoundError if the property is unknown or deactivated
   */
  async createBatch(propertyCode: string, createdBy: string | null = null): Promise<MoveBatch> {
    const property = await this.getActiveProperty(propertyCode);

    const batch = await this.runInTransaction("createBatch", (manager) =>
      manager.save(
        manager.create(MoveBatch, {
          propertyCode: property.code,
          createdBy,
          status: "pending",
          totalMoves: 0,
          processedMoves: 0,
          rejectedMoves: 0,
          failureReason: null,
        }),
      ),
    );

    this.logger.log(`Created batch ${batch.id} for ${property.code}`);
    return batch;
  }

  /**
   * Attaches candidate moves to a pending, empty batch and tags each with
   * its holiday period.
   *
   * All moves and the batch total are written in one transaction, so a
   * batch is either empty or fully assigned. A batch that receives no
   * moves is completed immediately.
   *
   * @throws LedgerValidationError if any candidate is malformed (nothing is written)
   * @throws LedgerNotFoundError if the batch does not exist
   * @throws StateConflictError if the batch already has moves or is not pending
   */
  async assignMoves(
    batchId: string,
    rawMoves: unknown,
    options: Pick<CreateBatchOptions, "analysisDate"> = {},
  ): Promise<DefragMove[]> {
    const documents = parseMoveDocuments(rawMoves);
    return this.assignDocuments(batchId, documents, options.analysisDate ?? new Date());
  }

  /**
   * Batch creation entry point for the analysis: creates the batch and
   * assigns its moves.
   *
   * Candidates are validated before the batch exists. If assignment fails
   * afterwards the batch is marked failed and the original error is
   * rethrown.
   */
  async createBatchWithMoves(
    propertyCode: string,
    rawMoves: unknown,
    options: CreateBatchOptions = {},
  ): Promise<BatchWithMoves> {
    const documents = parseMoveDocuments(rawMoves);
    const batch = await this.createBatch(propertyCode, options.createdBy ?? null);

    try {
      const moves = await this.assignDocuments(
        batch.id,
        documents,
        options.analysisDate ?? new Date(),
      );
      return { batch: await this.getBatch(batch.id), moves };
    } catch (error) {
      await this.failBatch(batch.id, `Move assignment failed: ${describeError(error)}`).catch(
        (failError: unknown) =>
          this.logger.error(
            `Could not mark batch ${batch.id} as failed: ${describeError(failError)}`,
          ),
      );
      throw error;
    }
  }

  /**
   * Approves or rejects one move and updates its batch, atomically.
   *
   * Approve: status=approved, isProcessed, approvedBy/At, processedBy/At,
   * batch.processedMoves + 1.
   * Reject: status=rejected, isRejected, rejectedBy/At,
   * batch.rejectedMoves + 1.
   *
   * @throws LedgerValidationError for an unknown action or a missing actor
   * @throws LedgerNotFoundError if the move does not exist
   * @throws StateConflictError if the move was already decided (also when
   *   a concurrent call decided it first) or its batch has failed
   * @throws PersistenceError if the store fails; nothing is written
   */
  async transitionMove(
    moveId: string,
    action: MoveAction,
    actor: string,
  ): Promise<MoveTransitionResult> {
    if (!MOVE_ACTIONS.includes(action)) {
      throw new LedgerValidationError(
        `action must be one of ${MOVE_ACTIONS.join(", ")}, got "${String(action)}"`,
      );
    }
    const decidedBy = this.requireActor(actor);

    const result = await this.runInTransaction("transitionMove", async (manager) => {
      const move = await manager.findOne(DefragMove, {
        where: { id: moveId },
        lock: { mode: "pessimistic_write" },
      });
      if (!move) {
        throw new LedgerNotFoundError("move", moveId);
      }
      if (move.isProcessed || move.isRejected) {
        throw new StateConflictError(`Move ${moveId} is already ${move.status}`);
      }
      if (!move.batchId) {
        throw new StateConflictError(`Move ${moveId} is not assigned to a batch`);
      }

      const now = new Date();
      const changes: MoveDecision =
        action === "approve"
          ? {
              status: "approved",
              isProcessed: true,
              approvedBy: decidedBy,
              approvedAt: now,
              processedBy: decidedBy,
              processedAt: now,
            }
          : {
              status: "rejected",
              isRejected: true,
              rejectedBy: decidedBy,
              rejectedAt: now,
            };

      const updated = await manager.update(
        DefragMove,
        { id: move.id, isProcessed: false, isRejected: false },
        changes,
      );
      if (!updated.affected) {
        throw new StateConflictError(`Move ${moveId} was decided by a concurrent request`);
      }

      await manager.increment(
        MoveBatch,
        { id: move.batchId },
        action === "approve" ? "processedMoves" : "rejectedMoves",
        1,
      );

      const batch = await manager.findOne(MoveBatch, { where: { id: move.batchId } });
      if (!batch) {
        throw new LedgerNotFoundError("batch", move.batchId);
      }
      if (batch.status === "failed") {
        throw new StateConflictError(`Batch ${batch.id} has failed; its moves cannot be decided`);
      }
      if (decidedMoves(batch) > batch.totalMoves) {
        throw new StateConflictError(
          `Batch ${batch.id} would have ${decidedMoves(batch)} decided of ${batch.totalMoves} moves`,
        );
      }

      const status = deriveBatchStatus(batch);
      if (status !== batch.status) {
        await manager.update(MoveBatch, { id: batch.id }, { status });
        batch.status = status;
      }

      return { move: Object.assign(move, changes), batch };
    });

    this.logger.log(
      `Move ${moveId} ${result.move.status} by ${decidedBy} (batch ${result.batch.id}: ${decidedMoves(result.batch)}/${result.batch.totalMoves}, ${result.batch.status})`,
    );
    return result;
  }

  /**
   * Marks a pending batch as failed, e.g. when its analysis or assignment
   * broke. Moves of a failed batch can no longer be decided.
   *
   * @throws StateConflictError unless the batch is pending
   */
  async failBatch(batchId: string, reason: string): Promise<MoveBatch> {
    const batch = await this.runInTransaction("failBatch", async (manager) => {
      const existing = await manager.findOne(MoveBatch, {
        where: { id: batchId },
        lock: { mode: "pessimistic_write" },
      });
      if (!existing) {
        throw new LedgerNotFoundError("batch", batchId);
      }
      if (existing.status !== "pending") {
        throw new StateConflictError(
          `Batch ${batchId} is ${existing.status}; only pending batches can be failed`,
        );
      }

      await manager.update(
        MoveBatch,
        { id: existing.id },
        { status: "failed", failureReason: reason },
      );
      existing.status = "failed";
      existing.failureReason = reason;
      return existing;
    });

    this.logger.warn(`Batch ${batchId} failed: ${reason}`);
    return batch;
  }

  /**
   * @throws LedgerNotFoundError if the batch does not exist
   */
  async getBatch(batchId: string): Promise<MoveBatch> {
    const batch = await this.read("getBatch", () =>
      this.batchRepository.findOne({ where: { id: batchId } }),
    );
    if (!batch) {
      throw new LedgerNotFoundError("batch", batchId);
    }
    return batch;
  }

  /**
   * Batches of a property, newest first.
   */
  async listBatches(propertyCode: string, status?: BatchStatus): Promise<MoveBatch[]> {
    const code = normalizePropertyCode(propertyCode);
    return this.read("listBatches", () =>
      this.batchRepository.find({
        where: status ? { propertyCode: code, status } : { propertyCode: code },
        order: { createdAt: "DESC" },
      }),
    );
  }

  /**
   * Moves of a batch in submission order.
   *
   * @throws LedgerNotFoundError if the batch does not exist
   */
  async listMoves(batchId: string): Promise<DefragMove[]> {
    await this.getBatch(batchId);
    return this.read("listMoves", () =>
      this.moveRepository.find({
        where: { batchId },
        order: { sequence: "ASC" },
      }),
    );
  }

  /**
   * Moves in a given status across all batches, oldest first.
   */
  async listMovesByStatus(status: MoveStatus, limit = 100): Promise<DefragMove[]> {
    return this.read("listMovesByStatus", () =>
      this.moveRepository.find({
        where: { status },
        order: { createdAt: "ASC" },
        take: limit,
      }),
    );
  }

  private async assignDocuments(
    batchId: string,
    documents: MoveDocument[],
    analysisDate: Date,
  ): Promise<DefragMove[]> {
    const batch = await this.getBatch(batchId);
    this.assertAssignable(batch);

    const property = await this.propertiesService.findByCode(batch.propertyCode);
    const periods = documents.length > 0 ? await this.periodsForBatch(batch, property) : [];

    const moves = await this.runInTransaction("assignMoves", async (manager) => {
      const locked = await manager.findOne(MoveBatch, {
        where: { id: batchId },
        lock: { mode: "pessimistic_write" },
      });
      if (!locked) {
        throw new LedgerNotFoundError("batch", batchId);
      }
      this.assertAssignable(locked);

      const entities = documents.map((document, index) =>
        manager.create(DefragMove, {
          propertyId: property.id,
          propertyCode: property.code,
          batchId: locked.id,
          sequence: index,
          analysisDate,
          moveData: document,
          status: "pending",
          isProcessed: false,
          isRejected: false,
          suggestedBy: locked.createdBy,
          ...holidayTagFor(periods, moveDateRange(document)),
        }),
      );
      const saved = entities.length > 0 ? await manager.save(DefragMove, entities) : [];

      const status: BatchStatus = documents.length === 0 ? "completed" : "pending";
      await manager.update(
        MoveBatch,
        { id: locked.id },
        { totalMoves: documents.length, status },
      );
      return saved;
    });

    const tagged = moves.filter((move) => move.isHolidayMove).length;
    this.logger.log(
      `Assigned ${moves.length} moves to batch ${batchId} (${tagged} during holidays)`,
    );
    return moves;
  }

  private assertAssignable(batch: MoveBatch): void {
    if (batch.status !== "pending" || batch.totalMoves > 0) {
      throw new StateConflictError(
        `Batch ${batch.id} already has moves assigned or is ${batch.status}`,
      );
    }
  }

  /**
   * Holiday periods for the window starting on the batch's creation day in
   * the holiday timezone. A property without a region gets no tags.
   */
  private async periodsForBatch(batch: MoveBatch, property: Property): Promise<HolidayPeriod[]> {
    if (!property.regionCode) {
      this.logger.debug(`Property ${property.code} has no region, moves stay untagged`);
      return [];
    }
    const fromDate = formatInRegionTimezone(batch.createdAt, this.holidayConfig.timezone);
    return this.holidayPeriodsService.combinedForwardPeriods(
      property.regionCode,
      fromDate,
      this.holidayConfig.windowDays,
    );
  }

  private async getActiveProperty(propertyCode: string): Promise<Property> {
    const property = await this.propertiesService.findByCode(propertyCode);
    if (!property.isActive) {
      throw new LedgerNotFoundError("property", property.code);
    }
    return property;
  }

  private requireActor(actor: string): string {
    const trimmed = typeof actor === "string" ? actor.trim() : "";
    if (!trimmed) {
      throw new LedgerValidationError("actor is required");
    }
    return trimmed;
  }

  /**
   * Runs one unit of work in its own transaction. The transaction is rolled
   * back before any error leaves this method.
   */
  private async runInTransaction<T>(
    operation: string,
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.dataSource.transaction(async (manager) => {
        await manager.query(`SET LOCAL lock_timeout = ${this.ledgerConfig.lockTimeoutMs}`);
        return work(manager);
      });
    } catch (error) {
      throw this.toLedgerError(operation, error);
    }
  }

  private async read<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw this.toLedgerError(operation, error);
    }
  }

  private toLedgerError(operation: string, error: unknown): HttpException {
    if (error instanceof HttpException) {
      return error;
    }

    const code = postgresErrorCode(error);
    if (code === PG_SERIALIZATION_FAILURE || code === PG_DEADLOCK_DETECTED) {
      return new StateConflictError(`${operation} conflicted with a concurrent request`);
    }

    const reason =
      code === PG_LOCK_NOT_AVAILABLE
        ? `lock not acquired within ${this.ledgerConfig.lockTimeoutMs}ms`
        : describeError(error);
    this.logger.error(`${operation} failed and was rolled back: ${reason}`);
    return new PersistenceError(`${operation} failed: ${reason}`, error);
  }
}

function postgresErrorCode(error: unknown): string | null {
  if (!(error instanceof QueryFailedError)) {
    return null;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === "object" &&
    driverError !== null &&
    "code" in driverError &&
    typeof driverError.code === "string"
  ) {
    return driverError.code;
  }
  return null;
}
