import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from "typeorm";
import { BatchStatus } from "../../common/types/status.type";

/**
 * Move Batch Entity
 *
 * The moves generated together from one analysis run for one property.
 *
 * Counters are only ever changed by SQL increments inside a ledger
 * transaction. Invariant: processedMoves + rejectedMoves <= totalMoves.
 *
 * Moves reference their batch through DefragMove.batchId; there is no
 * inverse relation here. Use MoveLedgerService.listMoves() instead.
 */
@Entity("move_batches")
@Index(["propertyCode", "status"])
export class MoveBatch {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column({ length: 32 })
  propertyCode!: string;

  @Column({ type: "varchar", length: 100, nullable: true })
  createdBy!: string | null;

  @Column({ type: "varchar", length: 20, default: "pending" })
  status!: BatchStatus;

  @Column({ type: "int", default: 0 })
  totalMoves!: number;

  @Column({ type: "int", default: 0 })
  processedMoves!: number;

  @Column({ type: "int", default: 0 })
  rejectedMoves!: number;

  @Column({ type: "text", nullable: true })
  failureReason!: string | null;

  @CreateDateColumn({ type: "timestamptz" })
  @Index()
  createdAt!: Date;

  @UpdateDateColumn({ type: "timestamptz" })
  updatedAt!: Date;
}
