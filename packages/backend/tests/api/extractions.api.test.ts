import express from "express";
import request from "supertest";
import { beforeEach, describe, expect, it } from "vitest";
import { errorHandler } from "../../src/middleware/errorHandler.js";
import { EntityExtractor } from "../../src/pipeline/EntityExtractor.js";
import { ExtractionPipeline } from "../../src/pipeline/ExtractionPipeline.js";
import { RelationshipExtractor } from "../../src/pipeline/RelationshipExtractor.js";
import { DisabledSimilarityScorer } from "../../src/pipeline/similarity.js";
import { createExtractionsRouter } from "../../src/routes/extractions.js";
import { InMemoryExtractionStore } from "../helpers/InMemoryExtractionStore.js";
import { fixedClock, seedExtractions, silentLogger } from "../helpers/fixtures.js";

const timWolffBody = {
  customer_id: "cust-001",
  extraction_id: "1772359200000_0000abcd",
  file_analysis: { customer_name: "Tim Wolff" },
  needs_analysis: { needs_scores: { certainty: 0.8, growth: 0.6 } }
};

describe("extractions api", () => {
  let store: InMemoryExtractionStore;
  let app: ReturnType<typeof express>;

  beforeEach(() => {
    store = new InMemoryExtractionStore();
    const pipeline = new ExtractionPipeline(store, {
      entityExtractor: new EntityExtractor({}, fixedClock),
      relationshipExtractor: new RelationshipExtractor(new DisabledSimilarityScorer(), {}, silentLogger),
      logger: silentLogger,
      clock: fixedClock
    });

    app = express();
    app.use(express.json());
    app.use("/api/extractions", createExtractionsRouter({ pipeline, extractionStore: store, clock: fixedClock }));
    app.use(errorHandler);
  });

  it("runs an extraction and stores its snapshot", async () => {
    const response = await request(app).post("/api/extractions").send(timWolffBody);

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      customer_id: "cust-001",
      extraction_id: "1772359200000_0000abcd",
      node_count: 3,
      edge_count: 2,
      rejected_edge_count: 0
    });
    expect(store.writes).toEqual([{ customerId: "cust-001", extractionId: "1772359200000_0000abcd" }]);
  });

  it("generates a time-ordered extraction id when none is given", async () => {
    const response = await request(app).post("/api/extractions").send({
      customer_id: timWolffBody.customer_id,
      file_analysis: timWolffBody.file_analysis,
      needs_analysis: timWolffBody.needs_analysis
    });

    expect(response.status).toBe(201);
    expect(response.body.extraction_id).toMatch(/^1772359200000_[0-9a-f]{8}$/);
  });

  it("refuses to overwrite an existing snapshot", async () => {
    await request(app).post("/api/extractions").send(timWolffBody);
    const response = await request(app).post("/api/extractions").send(timWolffBody);

    expect(response.status).toBe(409);
    expect(response.body.code).toBe("SNAPSHOT_EXISTS");
  });

  it("rejects an extraction without a primary subject", async () => {
    const response = await request(app)
      .post("/api/extractions")
      .send({ customer_id: "cust-001", extraction_id: "1772359200000_00000002" });

    expect(response.status).toBe(422);
    expect(response.body.code).toBe("MISSING_PRIMARY_SUBJECT");
    expect(store.writes).toEqual([]);
  });

  it("validates key components", async () => {
    const response = await request(app)
      .post("/api/extractions")
      .send({ ...timWolffBody, customer_id: "../cust-001" });

    expect(response.status).toBe(400);
    expect(response.body.code).toBe("VALIDATION_FAILED");
    expect(response.body.details).toEqual([{ path: "customer_id", message: "Invalid key component" }]);
  });

  it("lists a customer's extractions with the manifest", async () => {
    const ids = await seedExtractions(store, "cust-001", 2);

    const response = await request(app).get("/api/extractions/cust-001");

    expect(response.status).toBe(200);
    expect(response.headers["x-total-count"]).toBe("2");
    expect(response.body.extractions).toEqual(ids.map((id) => ({ extraction_id: id })));
    expect(response.body.manifest.extractions.map((entry: { nodeCount: number }) => entry.nodeCount)).toEqual([
      3, 3
    ]);
  });

  it("returns an empty list for an unknown customer", async () => {
    const response = await request(app).get("/api/extractions/cust-404");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ customer_id: "cust-404", manifest: null, extractions: [] });
  });

  it("reads a single snapshot", async () => {
    const [id] = await seedExtractions(store, "cust-001", 1);

    const found = await request(app).get(`/api/extractions/cust-001/${id ?? ""}`);
    expect(found.status).toBe(200);
    expect(found.body.snapshot.extractionId).toBe(id);
    expect(found.body.snapshot.nodes).toHaveLength(3);

    const missing = await request(app).get("/api/extractions/cust-001/1772359200000_ffffffff");
    expect(missing.status).toBe(404);
    expect(missing.body.code).toBe("SNAPSHOT_NOT_FOUND");
  });
});
