import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from "typeorm";
import { Property } from "../../properties/entities/property.entity";
import { MoveBatch } from "./move-batch.entity";
import { MoveStatus } from "../../common/types/status.type";
import {
  HolidayImportance,
  HolidayPeriodType,
} from "../../common/types/holiday-period.type";
import { MoveDocument } from "../utils/move-document.util";

/**
 * Defragmentation Move Entity
 *
 * A suggested relocation of one booking to another inventory unit.
 *
 * Lifecycle: pending -> approved | rejected.
 * isProcessed (approved) and isRejected are mutually exclusive; once either
 * is set the decision fields never change again.
 *
 * Holiday tag fields are copied from the winning HolidayPeriod when the
 * move is assigned to its batch.
 */
@Entity("defrag_moves")
@Index(["propertyCode", "batchId"])
@Index(["status", "createdAt"])
export class DefragMove {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @ManyToOne(() => Property, { onDelete: "RESTRICT" })
  @JoinColumn({ name: "propertyId" })
  property?: Property;

  @Column({ type: "uuid" })
  propertyId!: string;

  @Column({ length: 32 })
  propertyCode!: string;

  @ManyToOne(() => MoveBatch, { onDelete: "RESTRICT" })
  @JoinColumn({ name: "batchId" })
  batch?: MoveBatch;

  @Column({ type: "uuid", nullable: true })
  batchId!: string | null;

  /** Position within the batch, as submitted */
  @Column({ type: "int", default: 0 })
  sequence!: number;

  @Column({ type: "timestamptz" })
  analysisDate!: Date;

  @Column({ type: "jsonb" })
  moveData!: MoveDocument;

  @Column({ type: "varchar", length: 20, default: "pending" })
  status!: MoveStatus;

  @Column({ default: false })
  isProcessed!: boolean;

  @Column({ default: false })
  isRejected!: boolean;

  @Column({ type: "varchar", length: 100, nullable: true })
  suggestedBy!: string | null;

  @Column({ type: "varchar", length: 100, nullable: true })
  approvedBy!: string | null;

  @Column({ type: "timestamptz", nullable: true })
  approvedAt!: Date | null;

  @Column({ type: "varchar", length: 100, nullable: true })
  rejectedBy!: string | null;

  @Column({ type: "timestamptz", nullable: true })
  rejectedAt!: Date | null;

  @Column({ type: "varchar", length: 100, nullable: true })
  processedBy!: string | null;

  @Column({ type: "timestamptz", nullable: true })
  processedAt!: Date | null;

  // Holiday tag
  @Column({ default: false })
  isHolidayMove!: boolean;

  @Column({ type: "varchar", length: 255, nullable: true })
  holidayPeriodName!: string | null;

  @Column({ type: "varchar", length: 10, nullable: true })
  holidayType!: HolidayPeriodType | null;

  @Column({ type: "varchar", length: 10, nullable: true })
  holidayImportance!: HolidayImportance | null;

  @CreateDateColumn({ type: "timestamptz" })
  createdAt!: Date;

  @UpdateDateColumn({ type: "timestamptz" })
  updatedAt!: Date;
}
