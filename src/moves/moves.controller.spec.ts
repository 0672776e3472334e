import { INestApplication } from "@nestjs/common";
import { randomUUID } from "crypto";
import request from "supertest";
import { Property } from "../properties/entities/property.entity";
import { MoveBatch } from "./entities/move-batch.entity";
import { InMemoryDataSource } from "../../test/mocks/in-memory-data-source";
import {
  closeTestApp,
  createLedgerTestingModule,
  createTestApp,
} from "../../test/helpers/test-app.helper";
import { createTestProperties } from "../../test/fixtures/property.fixtures";

describe("Batches and moves API", () => {
  let app: INestApplication;
  let dataSource: InMemoryDataSource;

  const createBatch = (moves: unknown[]) =>
    request(app.getHttpServer())
      .post("/v1/properties/cali/batches")
      .send({ createdBy: "analysis", moves });

  beforeEach(async () => {
    const context = await createLedgerTestingModule();
    dataSource = context.dataSource;
    for (const property of createTestProperties()) {
      await dataSource.seed(Property, property);
    }
    app = await createTestApp(context.module);
  });

  afterEach(async () => {
    await closeTestApp(app);
  });

  describe("POST /v1/properties/:code/batches", () => {
    it("should create a batch with its moves", async () => {
      const response = await createBatch([
        { startDate: "2026-05-04", endDate: "2026-05-06", details: { reservation: "R-1001" } },
      ]).expect(201);

      expect(response.headers["cache-control"]).toBe(
        "private, no-store, no-cache, must-revalidate",
      );
      expect(response.body.batchId).toBe(response.body.batch.id);
      expect(response.body.batch).toMatchObject({
        propertyCode: "CALI",
        createdBy: "analysis",
        status: "pending",
        totalMoves: 1,
        completionPercentage: 0,
        isComplete: false,
      });
      expect(response.body.moves).toHaveLength(1);
      expect(response.body.moves[0]).toMatchObject({
        sequence: 0,
        status: "pending",
        moveData: {
          startDate: "2026-05-04",
          endDate: "2026-05-06",
          details: { reservation: "R-1001" },
        },
        isHolidayMove: false,
        holiday: null,
      });
    });

    it("should return 400 with every invalid candidate", async () => {
      const response = await createBatch([
        { startDate: "2026-05-04", endDate: "04/05/2026" },
      ]).expect(400);

      expect(response.body).toMatchObject({
        statusCode: 400,
        message: ["moves[0]: endDate must be YYYY-MM-DD"],
        error: "ValidationError",
      });
      expect(dataSource.rows(MoveBatch)).toHaveLength(0);
    });

    it("should return 404 for an inactive property", async () => {
      const response = await request(app.getHttpServer())
        .post("/v1/properties/QOLD/batches")
        .send({ moves: [] })
        .expect(404);

      expect(response.body.error).toBe("PropertyNotFound");
    });
  });

  describe("POST /v1/moves/:id/transition", () => {
    it("should approve once and answer 409 afterwards", async () => {
      const created = await createBatch([{ startDate: "2026-05-04", endDate: "2026-05-06" }]);
      const moveId: string = created.body.moves[0].id;

      const approved = await request(app.getHttpServer())
        .post(`/v1/moves/${moveId}/transition`)
        .send({ action: "approve", actor: "alice" })
        .expect(200);

      expect(approved.body.move).toMatchObject({ status: "approved", approvedBy: "alice" });
      expect(approved.body.batch).toMatchObject({
        status: "completed",
        completionPercentage: 100,
        isComplete: true,
      });

      const conflict = await request(app.getHttpServer())
        .post(`/v1/moves/${moveId}/transition`)
        .send({ action: "approve", actor: "bob" })
        .expect(409);

      expect(conflict.body).toMatchObject({
        statusCode: 409,
        error: "StateConflict",
        message: `Move ${moveId} is already approved`,
      });
    });

    it("should offer no route that changes a decided move", async () => {
      const created = await createBatch([{ startDate: "2026-05-04", endDate: "2026-05-06" }]);
      const moveId: string = created.body.moves[0].id;
      await request(app.getHttpServer())
        .post(`/v1/moves/${moveId}/transition`)
        .send({ action: "approve", actor: "alice" })
        .expect(200);

      await request(app.getHttpServer())
        .post(`/v1/moves/${moveId}/apply`)
        .send({ actor: "front-desk" })
        .expect(404);
    });

    it("should return 400 for an unknown action", async () => {
      const response = await request(app.getHttpServer())
        .post(`/v1/moves/${randomUUID()}/transition`)
        .send({ action: "archive", actor: "alice" })
        .expect(400);

      expect(response.body.message).toContain(
        "action must be one of the following values: approve, reject",
      );
    });

    it("should return 404 for an unknown move", async () => {
      const response = await request(app.getHttpServer())
        .post(`/v1/moves/${randomUUID()}/transition`)
        .send({ action: "reject", actor: "alice" })
        .expect(404);

      expect(response.body.error).toBe("MoveNotFound");
    });
  });

  describe("GET /v1/batches", () => {
    it("should list batches of a property", async () => {
      await createBatch([]);

      const response = await request(app.getHttpServer())
        .get("/v1/batches")
        .query({ propertyCode: "CALI", status: "completed" })
        .expect(200);

      expect(response.body).toHaveLength(1);
      expect(response.body[0]).toMatchObject({ status: "completed", totalMoves: 0 });
    });

    it("should return 400 for a malformed batch id", async () => {
      await request(app.getHttpServer()).get("/v1/batches/not-a-uuid").expect(400);
    });
  });
});
