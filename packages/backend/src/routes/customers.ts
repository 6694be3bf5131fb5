import { Router } from "express";
import { z } from "zod";
import type {
  ApiErrorResponse,
  CustomerGraphResponse,
  CustomerGraphSummary,
  GraphDatabase,
  GraphRecord
} from "@customer-graph/shared";
import { asyncHandler } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import { ensureGraphDatabaseConnected, getGraphDatabaseSingleton } from "../runtime/graphRuntime.js";
import { logger } from "../utils/logger.js";

const customerParamsSchema = z.object({
  customerId: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/, "Invalid key component")
});

const graphQuerySchema = z.object({
  view: z.enum(["nodes", "edges", "summary"]).default("summary")
});

export interface CreateCustomersRouterOptions {
  graphDatabase?: GraphDatabase;
  ensureGraphDatabaseConnected?: () => Promise<void>;
}

function countBy(records: GraphRecord[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const record of records) {
    counts[record.type] = (counts[record.type] ?? 0) + 1;
  }
  return counts;
}

export function summarize(vertices: GraphRecord[], edges: GraphRecord[]): CustomerGraphSummary {
  const extractionIds = new Set<string>();
  for (const record of [...vertices, ...edges]) {
    if (record.properties.extractionId) {
      extractionIds.add(record.properties.extractionId);
    }
  }

  return {
    nodeCount: vertices.length,
    edgeCount: edges.length,
    nodeTypeDistribution: countBy(vertices),
    edgeTypeDistribution: countBy(edges),
    extractionIds: [...extractionIds].sort()
  };
}

export function createCustomersRouter(options: CreateCustomersRouterOptions = {}): Router {
  const graphDatabase = options.graphDatabase ?? getGraphDatabaseSingleton();
  const ensureConnected =
    options.ensureGraphDatabaseConnected ??
    (options.graphDatabase ? () => graphDatabase.connect() : () => ensureGraphDatabaseConnected(graphDatabase));
  const customersRouter = Router();

  customersRouter.get(
    "/:customerId/graph",
    validate({ params: customerParamsSchema, query: graphQuerySchema }),
    asyncHandler(async (req, res) => {
      const { customerId } = customerParamsSchema.parse(req.params);
      const { view } = graphQuerySchema.parse(req.query);

      try {
        await ensureConnected();
      } catch (error) {
        logger.error({ err: error }, "Graph database connection failed");
        const body: ApiErrorResponse = { error: "Graph database unavailable" };
        res.status(503).json(body);
        return;
      }

      const response: CustomerGraphResponse = { customer_id: customerId, view };
      if (view === "nodes") {
        const vertices = await graphDatabase.queryByCustomer(customerId, "vertex");
        response.nodes = vertices.map((record) => ({
          id: record.id,
          type: record.type,
          properties: record.properties
        }));
      } else if (view === "edges") {
        const edges = await graphDatabase.queryByCustomer(customerId, "edge");
        response.edges = edges.map((record) => ({
          id: record.id,
          type: record.type,
          from: record.from ?? "",
          to: record.to ?? "",
          properties: record.properties
        }));
      } else {
        const [vertices, edges] = await Promise.all([
          graphDatabase.queryByCustomer(customerId, "vertex"),
          graphDatabase.queryByCustomer(customerId, "edge")
        ]);
        response.summary = summarize(vertices, edges);
      }

      res.json(response);
    })
  );

  return customersRouter;
}
