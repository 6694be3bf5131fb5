import cors from "cors";
import express, { type Express } from "express";
import type { ApiErrorResponse } from "@customer-graph/shared";
import { appConfig } from "./config.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { apiRateLimiter } from "./middleware/rateLimiter.js";
import { createCustomersRouter, type CreateCustomersRouterOptions } from "./routes/customers.js";
import { createExtractionsRouter, type CreateExtractionsRouterOptions } from "./routes/extractions.js";
import { createHealthRouter, type CreateHealthRouterOptions } from "./routes/health.js";
import { createMetricsRouter, type CreateMetricsRouterOptions } from "./routes/metrics.js";
import { createUploadsRouter, type CreateUploadsRouterOptions } from "./routes/uploads.js";

export interface CreateAppOptions {
  extractions?: CreateExtractionsRouterOptions;
  uploads?: CreateUploadsRouterOptions;
  customers?: CreateCustomersRouterOptions;
  health?: CreateHealthRouterOptions;
  metrics?: CreateMetricsRouterOptions;
  rateLimit?: boolean;
}

export function createApp(options: CreateAppOptions = {}): Express {
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: appConfig.CORS_ORIGIN,
      exposedHeaders: ["x-total-count"]
    })
  );
  app.use(express.json({ limit: "2mb" }));
  if (options.rateLimit ?? true) {
    app.use("/api", apiRateLimiter);
  }

  app.use("/api/extractions", createExtractionsRouter(options.extractions));
  app.use("/api/uploads", createUploadsRouter(options.uploads));
  app.use("/api/customers", createCustomersRouter(options.customers));
  app.use("/api/health", createHealthRouter(options.health));
  app.use("/metrics", createMetricsRouter(options.metrics));

  app.use((_req, res) => {
    const body: ApiErrorResponse = { error: "Route not found" };
    res.status(404).json(body);
  });

  app.use(errorHandler);

  return app;
}
