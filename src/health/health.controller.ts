import { Controller, Get, Logger } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { InjectDataSource, InjectRepository } from "@nestjs/typeorm";
import { DataSource, Repository } from "typeorm";
import { MoveBatch } from "../moves/entities/move-batch.entity";
import { HolidayPeriodsService } from "../holidays/holiday-periods.service";
import { describeError } from "../common/errors/upstream.error";
import * as packageJson from "../../package.json";

export interface HealthStatus {
  status: "ok" | "degraded";
  timestamp: string;
  uptime: number;
  version: string;
  services: {
    database: {
      status: "connected" | "disconnected";
      type: string;
    };
    holidays: {
      cachedPublicCalendars: string[];
      cachedSchoolCalendars: string[];
    };
  };
  data: {
    openBatches: number | null;
  };
}

@ApiTags("health")
@Controller("health")
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    @InjectRepository(MoveBatch)
    private readonly batchRepository: Repository<MoveBatch>,
    private readonly holidayPeriodsService: HolidayPeriodsService,
  ) {}

  @Get()
  @ApiOperation({
    summary: "System health check",
    description:
      "Returns database connectivity, cached holiday calendars and the number of open batches.",
  })
  @ApiResponse({
    status: 200,
    description: "System health status retrieved successfully",
    schema: {
      type: "object",
      properties: {
        status: { type: "string", example: "ok" },
        timestamp: { type: "string", format: "date-time" },
        uptime: { type: "number" },
        services: { type: "object" },
        data: { type: "object" },
      },
    },
  })
  async getHealth(): Promise<HealthStatus> {
    const [databaseUp, openBatches] = await Promise.all([
      this.checkDatabase(),
      this.countOpenBatches(),
    ]);
    const cache = this.holidayPeriodsService.cacheStats();

    return {
      status: databaseUp ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      version: packageJson.version,
      services: {
        database: {
          status: databaseUp ? "connected" : "disconnected",
          type: "PostgreSQL",
        },
        holidays: {
          cachedPublicCalendars: cache.publicKeys,
          cachedSchoolCalendars: cache.schoolKeys,
        },
      },
      data: {
        openBatches,
      },
    };
  }

  @Get("ping")
  ping(): { message: string; timestamp: string } {
    return {
      message: "pong",
      timestamp: new Date().toISOString(),
    };
  }

  private async checkDatabase(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query("SELECT 1");
      return true;
    } catch (error) {
      this.logger.warn(`Database check failed: ${describeError(error)}`);
      return false;
    }
  }

  private async countOpenBatches(): Promise<number | null> {
    try {
      return await this.batchRepository.count({
        where: [{ status: "pending" }, { status: "processing" }],
      });
    } catch (error) {
      this.logger.warn(`Could not count open batches: ${describeError(error)}`);
      return null;
    }
  }
}
