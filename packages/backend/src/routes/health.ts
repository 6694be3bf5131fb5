import { Router } from "express";
import type { HealthResponse, ServiceCheckStatus } from "@customer-graph/shared";
import { asyncHandler } from "../middleware/errorHandler.js";
import {
  checkExtractionStoreConnection,
  checkGraphDatabaseConnection
} from "../runtime/connectivity.js";

export interface CreateHealthRouterOptions {
  checkGraphDatabase?: () => Promise<ServiceCheckStatus>;
  checkExtractionStore?: () => Promise<ServiceCheckStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions = {}): Router {
  const checkGraphDatabase = options.checkGraphDatabase ?? (() => checkGraphDatabaseConnection());
  const checkExtractionStore = options.checkExtractionStore ?? (() => checkExtractionStoreConnection());
  const startTime = options.startTime ?? Date.now();

  const healthRouter = Router();

  healthRouter.get(
    "/",
    asyncHandler(async (_req, res) => {
      const [graphDatabase, extractionStore] = await Promise.all([
        checkGraphDatabase(),
        checkExtractionStore()
      ]);
      const status: HealthResponse["status"] =
        graphDatabase === "failed" || extractionStore === "failed" ? "degraded" : "ok";

      const mem = process.memoryUsage();
      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
        checks: {
          graphDatabase,
          extractionStore
        },
        memoryUsage: {
          rss: mem.rss,
          heapUsed: mem.heapUsed,
          heapTotal: mem.heapTotal
        }
      };
      res.json(response);
    })
  );

  return healthRouter;
}
