import express from "express";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { errorHandler } from "../../src/middleware/errorHandler.js";
import { createUploadsRouter } from "../../src/routes/uploads.js";
import { InMemoryUploadRecordStore } from "../../src/services/InMemoryUploadRecordStore.js";
import { BulkUploadCoordinator } from "../../src/upload/BulkUploadCoordinator.js";
import { FakeGraphDatabase } from "../helpers/FakeGraphDatabase.js";
import { InMemoryExtractionStore } from "../helpers/InMemoryExtractionStore.js";
import { extractionIdAt, fixedClock, seedExtractions, silentLogger } from "../helpers/fixtures.js";

describe("uploads api", () => {
  let extractionStore: InMemoryExtractionStore;
  let graphDatabase: FakeGraphDatabase;
  let app: ReturnType<typeof express>;

  beforeEach(() => {
    extractionStore = new InMemoryExtractionStore();
    graphDatabase = new FakeGraphDatabase();
    const coordinator = new BulkUploadCoordinator(
      {
        extractionStore,
        graphDatabase,
        recordStore: new InMemoryUploadRecordStore(),
        logger: silentLogger,
        clock: fixedClock,
        sleep: async () => {}
      },
      { maxAttempts: 2, retryDelayMs: 0 }
    );

    app = express();
    app.use(express.json());
    app.use(
      "/api/uploads",
      createUploadsRouter({ coordinator, ensureGraphDatabaseConnected: () => graphDatabase.connect() })
    );
    app.use(errorHandler);
  });

  it("uploads a customer's pending extractions", async () => {
    const ids = await seedExtractions(extractionStore, "cust-001", 2);

    const response = await request(app).post("/api/uploads").send({ customer_id: "cust-001" });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      customer_id: "cust-001",
      dry_run: false,
      processed: 2,
      succeeded: 2,
      failed: 0,
      cancelled: false
    });
    expect(response.body.outcomes.map((outcome: { extractionId: string }) => outcome.extractionId)).toEqual(ids);
    expect(graphDatabase.countVertices("cust-001")).toBe(3);
  });

  it("validates without touching the graph in a dry run", async () => {
    await seedExtractions(extractionStore, "cust-001", 3);
    graphDatabase.connectError = new Error("should not connect");

    const response = await request(app).post("/api/uploads").send({ customer_id: "cust-001", dry_run: true });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ dry_run: true, processed: 3, succeeded: 0, failed: 0 });
    expect(graphDatabase.calls).toEqual([]);
  });

  it("answers 503 when the graph database is unreachable", async () => {
    graphDatabase.connectError = new Error("connection refused");

    const response = await request(app).post("/api/uploads").send({ customer_id: "cust-001" });

    expect(response.status).toBe(503);
    expect(response.body).toEqual({ error: "Graph database unavailable" });
  });

  it("maps a cross-customer violation to 409", async () => {
    await seedExtractions(extractionStore, "cust-001", 1);
    extractionStore.strayRefs.push({ customerId: "cust-002", extractionId: extractionIdAt(9) });

    const response = await request(app).post("/api/uploads").send({ customer_id: "cust-001" });

    expect(response.status).toBe(409);
    expect(response.body.code).toBe("CROSS_CUSTOMER_VIOLATION");
    expect(response.body.details).toMatchObject({ customerId: "cust-001", actualCustomerId: "cust-002" });
  });

  it("uploads several customers and reports failures per customer", async () => {
    await seedExtractions(extractionStore, "cust-a", 1);
    await seedExtractions(extractionStore, "cust-b", 2);

    const response = await request(app)
      .post("/api/uploads/batch")
      .send({ customer_ids: ["cust-b", "cust-a"] });

    expect(response.status).toBe(200);
    expect(response.body.failures).toEqual([]);
    expect(response.body.results.map((result: { customer_id: string; succeeded: number }) => [
      result.customer_id,
      result.succeeded
    ])).toEqual([
      ["cust-a", 1],
      ["cust-b", 2]
    ]);
  });

  it("rejects an empty batch", async () => {
    const response = await request(app).post("/api/uploads/batch").send({ customer_ids: [] });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_FAILED");
  });

  it("lists upload records for a customer", async () => {
    const [id] = await seedExtractions(extractionStore, "cust-001", 1);
    await request(app).post("/api/uploads").send({ customer_id: "cust-001" });

    const response = await request(app).get("/api/uploads/cust-001");

    expect(response.status).toBe(200);
    expect(response.body.customer_id).toBe("cust-001");
    expect(response.body.records).toHaveLength(1);
    expect(response.body.records[0]).toMatchObject({
      customerId: "cust-001",
      extractionId: id,
      attemptCount: 1,
      nodesWritten: 3,
      edgesWritten: 2,
      state: { status: "SUCCEEDED", completedAt: "2026-03-01T10:00:00.000Z" }
    });
  });
});
