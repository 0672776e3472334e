import { Test, TestingModule } from "@nestjs/testing";
import { INestApplication, ValidationPipe } from "@nestjs/common";
import { getRepositoryToken } from "@nestjs/typeorm";
import { DataSource } from "typeorm";
import { MoveLedgerService } from "../../src/moves/move-ledger.service";
import { BatchesController } from "../../src/moves/batches.controller";
import { MovesController } from "../../src/moves/moves.controller";
import { MoveBatch } from "../../src/moves/entities/move-batch.entity";
import { DefragMove } from "../../src/moves/entities/defrag-move.entity";
import { PropertiesService } from "../../src/properties/properties.service";
import { PropertiesController } from "../../src/properties/properties.controller";
import { RegionClassifier } from "../../src/properties/region-classifier.service";
import { Property } from "../../src/properties/entities/property.entity";
import { HolidayPeriodsService } from "../../src/holidays/holiday-periods.service";
import { HttpExceptionFilter } from "../../src/common/filters/http-exception.filter";
import { InMemoryDataSource } from "../mocks/in-memory-data-source";

export interface MockHolidayPeriodsService {
  combinedForwardPeriods: jest.Mock;
}

export interface LedgerTestContext {
  module: TestingModule;
  dataSource: InMemoryDataSource;
  holidayPeriods: MockHolidayPeriodsService;
}

/**
 * Holiday lookups answer with no periods unless a test says otherwise
 */
export const createMockHolidayPeriodsService = (): MockHolidayPeriodsService => ({
  combinedForwardPeriods: jest.fn().mockResolvedValue([]),
});

/**
 * Ledger, registry and their controllers on top of the in-memory store.
 * Holiday periods are mocked.
 */
export async function createLedgerTestingModule(
  dataSource: InMemoryDataSource = new InMemoryDataSource(),
  holidayPeriods: MockHolidayPeriodsService = createMockHolidayPeriodsService(),
): Promise<LedgerTestContext> {
  const module = await Test.createTestingModule({
    controllers: [BatchesController, MovesController, PropertiesController],
    providers: [
      MoveLedgerService,
      PropertiesService,
      RegionClassifier,
      { provide: DataSource, useValue: dataSource },
      { provide: getRepositoryToken(Property), useValue: dataSource.getRepository(Property) },
      { provide: getRepositoryToken(MoveBatch), useValue: dataSource.getRepository(MoveBatch) },
      { provide: getRepositoryToken(DefragMove), useValue: dataSource.getRepository(DefragMove) },
      { provide: HolidayPeriodsService, useValue: holidayPeriods },
    ],
  }).compile();

  return { module, dataSource, holidayPeriods };
}

/**
 * HTTP application with the same pipes, filter and prefix as production
 */
export async function createTestApp(module: TestingModule): Promise<INestApplication> {
  const app = module.createNestApplication({ logger: false });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.setGlobalPrefix("v1");

  await app.init();

  return app;
}

export async function closeTestApp(app: INestApplication | undefined): Promise<void> {
  if (app) {
    await app.close();
  }
}

/**
 * Clock that moves one second forward on every read, so rows created in
 * sequence get distinct, increasing timestamps.
 */
export function tickingClock(start: string): () => Date {
  let current = Date.parse(start);
  return () => {
    current += 1000;
    return new Date(current);
  };
}
