import { Router } from "express";
import type { Registry } from "prom-client";
import { asyncHandler } from "../middleware/errorHandler.js";
import { getMetricsSingleton } from "../runtime/graphRuntime.js";

export interface CreateMetricsRouterOptions {
  registry?: Registry;
}

/** Prometheus exposition of every metric in the registry. */
export function createMetricsRouter(options: CreateMetricsRouterOptions = {}): Router {
  const registry = options.registry ?? getMetricsSingleton().registry;
  const metricsRouter = Router();

  metricsRouter.get(
    "/",
    asyncHandler(async (_req, res) => {
      const body = await registry.metrics();
      res.setHeader("Content-Type", registry.contentType);
      res.send(body);
    })
  );

  return metricsRouter;
}
