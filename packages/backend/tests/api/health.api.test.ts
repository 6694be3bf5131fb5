import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { errorHandler } from "../../src/middleware/errorHandler.js";
import { createHealthRouter } from "../../src/routes/health.js";

describe("health api", () => {
  it("returns ok when dependencies are healthy", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkGraphDatabase: async () => "ok",
        checkExtractionStore: async () => "ok",
        startTime: Date.now() - 5_000
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
    expect(response.body.checks).toEqual({ graphDatabase: "ok", extractionStore: "ok" });
    expect(response.body.uptimeSec).toBeGreaterThanOrEqual(5);
    expect(response.body.memoryUsage.rss).toBeGreaterThan(0);
  });

  it("returns degraded when one dependency fails", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkGraphDatabase: async () => "not_configured",
        checkExtractionStore: async () => "failed"
      })
    );

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(200);
    expect(response.body.status).toBe("degraded");
    expect(response.body.checks).toEqual({
      graphDatabase: "not_configured",
      extractionStore: "failed"
    });
  });

  it("reports a throwing check as an internal error", async () => {
    const app = express();
    app.use(
      "/api/health",
      createHealthRouter({
        checkGraphDatabase: async () => {
          throw new Error("boom");
        },
        checkExtractionStore: async () => "ok"
      })
    );
    app.use(errorHandler);

    const response = await request(app).get("/api/health");
    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: "Internal server error" });
  });
});
