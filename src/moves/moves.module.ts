import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { MoveBatch } from "./entities/move-batch.entity";
import { DefragMove } from "./entities/defrag-move.entity";
import { MoveLedgerService } from "./move-ledger.service";
import { BatchesController } from "./batches.controller";
import { MovesController } from "./moves.controller";
import { PropertiesModule } from "../properties/properties.module";
import { HolidaysModule } from "../holidays/holidays.module";

/**
 * Moves Module
 *
 * The move batch ledger: batch creation, holiday tagging and the
 * approve/reject lifecycle.
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([MoveBatch, DefragMove]),
    PropertiesModule,
    HolidaysModule,
  ],
  controllers: [BatchesController, MovesController],
  providers: [MoveLedgerService],
  exports: [MoveLedgerService],
})
export class MovesModule {}
