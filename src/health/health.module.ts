import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { HealthController } from "./health.controller";
import { MoveBatch } from "../moves/entities/move-batch.entity";
import { HolidaysModule } from "../holidays/holidays.module";

/**
 * Health Module
 *
 * Provides health check endpoints with ledger statistics.
 */
@Module({
  imports: [TypeOrmModule.forFeature([MoveBatch]), HolidaysModule],
  controllers: [HealthController],
})
export class HealthModule {}
