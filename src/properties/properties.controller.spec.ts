import { INestApplication } from "@nestjs/common";
import request from "supertest";
import { Property } from "./entities/property.entity";
import { InMemoryDataSource } from "../../test/mocks/in-memory-data-source";
import {
  closeTestApp,
  createLedgerTestingModule,
  createTestApp,
} from "../../test/helpers/test-app.helper";
import { createTestProperty } from "../../test/fixtures/property.fixtures";

describe("Properties API", () => {
  let app: INestApplication;
  let dataSource: InMemoryDataSource;

  beforeEach(async () => {
    const context = await createLedgerTestingModule();
    dataSource = context.dataSource;
    app = await createTestApp(context.module);
  });

  afterEach(async () => {
    await closeTestApp(app);
  });

  it("POST /v1/properties/ingest should report every record", async () => {
    const response = await request(app.getHttpServer())
      .post("/v1/properties/ingest")
      .send({
        records: [
          { code: "cali", name: "Alice Springs Lodge" },
          { code: "VMEL", name: "Melbourne CBD Apartments", state: "VIC" },
          { name: "No Code" },
        ],
      })
      .expect(200);

    expect(response.body.ingested).toBe(2);
    expect(response.body.skipped).toBe(1);
    expect(
      response.body.results.map((r: { code: string | null; status: string }) => [r.code, r.status]),
    ).toEqual([
      ["CALI", "created"],
      ["VMEL", "created"],
      [null, "skipped"],
    ]);
    expect(dataSource.rows(Property).map((p) => p.regionCode)).toEqual(["NT", "VIC"]);
  });

  it("GET /v1/properties should hide inactive properties unless asked", async () => {
    await dataSource.seed(Property, createTestProperty());
    await dataSource.seed(
      Property,
      createTestProperty({ code: "QOLD", regionCode: "QLD", isActive: false }),
    );

    const active = await request(app.getHttpServer()).get("/v1/properties").expect(200);
    const all = await request(app.getHttpServer())
      .get("/v1/properties?includeInactive=true")
      .expect(200);
    const explicitFalse = await request(app.getHttpServer())
      .get("/v1/properties?includeInactive=false")
      .expect(200);

    expect(active.body.map((p: { code: string }) => p.code)).toEqual(["CALI"]);
    expect(all.body.map((p: { code: string }) => p.code)).toEqual(["CALI", "QOLD"]);
    expect(explicitFalse.body.map((p: { code: string }) => p.code)).toEqual(["CALI"]);
  });

  it("POST /v1/properties/:code/reclassify should apply a hint", async () => {
    await dataSource.seed(Property, createTestProperty());

    const response = await request(app.getHttpServer())
      .post("/v1/properties/cali/reclassify")
      .send({ state: "WA" })
      .expect(200);

    expect(response.body).toMatchObject({
      property: { code: "CALI", regionCode: "WA" },
      rule: "explicit",
      changed: true,
    });
  });

  it("GET /v1/properties/:code should return 404 for an unknown code", async () => {
    const response = await request(app.getHttpServer()).get("/v1/properties/nope").expect(404);

    expect(response.body).toMatchObject({
      error: "PropertyNotFound",
      message: 'Property "NOPE" not found',
    });
  });
});
