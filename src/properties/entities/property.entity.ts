import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  BeforeInsert,
  BeforeUpdate,
  Index,
} from "typeorm";
import { RegionCode } from "../../common/types/region-code.type";

/**
 * Property Entity
 *
 * An accommodation property whose inventory is defragmented.
 * Examples: "CALI" (Alice Springs), "VMEL" (Melbourne CBD)
 *
 * Ingest Mapping:
 * - code → code (upper-cased)
 * - name → name
 * - externalId / propertyId → externalId (reservation-system id)
 * - state / stateCode / region / regionCode / name / code → regionCode (RegionClassifier)
 *
 * Never deleted, only deactivated. Region code is written only by the
 * RegionClassifier.
 */
@Entity("properties")
export class Property {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column({ unique: true })
  code!: string;

  @Column()
  @Index()
  name!: string;

  @Column({ type: "varchar", nullable: true })
  externalId!: string | null;

  @Column({ type: "varchar", length: 3, nullable: true })
  @Index()
  regionCode!: RegionCode | null;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @BeforeInsert()
  @BeforeUpdate()
  normalizeCode(): void {
    if (this.code) {
      this.code = this.code.trim().toUpperCase();
    }
  }
}
