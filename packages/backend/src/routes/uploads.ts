import type { Response } from "express";
import { Router } from "express";
import { z } from "zod";
import type {
  ApiErrorResponse,
  BatchUploadResponse,
  BulkUploadResponse,
  BulkUploadResult,
  ListUploadRecordsResponse
} from "@customer-graph/shared";
import { describeError, isCustomerGraphError } from "../errors.js";
import { asyncHandler } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import { ensureGraphDatabaseConnected, getUploadCoordinatorSingleton } from "../runtime/graphRuntime.js";
import type { BulkUploadCoordinator } from "../upload/BulkUploadCoordinator.js";
import { logger } from "../utils/logger.js";

const keyComponentSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/, "Invalid key component");

const uploadBodySchema = z.object({
  customer_id: keyComponentSchema,
  dry_run: z.boolean().default(false)
});

const batchUploadBodySchema = z.object({
  customer_ids: z.array(keyComponentSchema).min(1).max(100),
  dry_run: z.boolean().default(false)
});

const customerParamsSchema = z.object({
  customerId: keyComponentSchema
});

export interface CreateUploadsRouterOptions {
  coordinator?: BulkUploadCoordinator;
  ensureGraphDatabaseConnected?: () => Promise<void>;
}

function toResponse(result: BulkUploadResult): BulkUploadResponse {
  return {
    customer_id: result.customerId,
    dry_run: result.dryRun,
    processed: result.processed,
    succeeded: result.succeeded,
    failed: result.failed,
    duration_seconds: result.durationSeconds,
    cancelled: result.cancelled,
    outcomes: result.outcomes
  };
}

/** Aborts the run between extractions when the client goes away. */
function abortOnClose(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

export function createUploadsRouter(options: CreateUploadsRouterOptions = {}): Router {
  const coordinator = () => options.coordinator ?? getUploadCoordinatorSingleton();
  const ensureConnected = options.ensureGraphDatabaseConnected ?? (() => ensureGraphDatabaseConnected());
  const uploadsRouter = Router();

  const ensureGraphReady = async (res: Response, dryRun: boolean): Promise<boolean> => {
    if (dryRun) {
      return true;
    }
    try {
      await ensureConnected();
      return true;
    } catch (error) {
      logger.error({ err: error }, "Graph database connection failed");
      const body: ApiErrorResponse = { error: "Graph database unavailable" };
      res.status(503).json(body);
      return false;
    }
  };

  uploadsRouter.post(
    "/",
    validate({ body: uploadBodySchema }),
    asyncHandler(async (req, res) => {
      const body = uploadBodySchema.parse(req.body);
      if (!(await ensureGraphReady(res, body.dry_run))) {
        return;
      }

      const controller = abortOnClose(res);
      const result = await coordinator().upload(
        { customerId: body.customer_id, dryRun: body.dry_run },
        { signal: controller.signal }
      );
      res.json(toResponse(result));
    })
  );

  uploadsRouter.post(
    "/batch",
    validate({ body: batchUploadBodySchema }),
    asyncHandler(async (req, res) => {
      const body = batchUploadBodySchema.parse(req.body);
      if (!(await ensureGraphReady(res, body.dry_run))) {
        return;
      }

      const controller = abortOnClose(res);
      const { results, failures } = await coordinator().uploadCustomers(body.customer_ids, body.dry_run, {
        signal: controller.signal
      });

      const response: BatchUploadResponse = {
        results: results.map(toResponse),
        failures: failures.map((failure) => {
          const item: BatchUploadResponse["failures"][number] = {
            customer_id: failure.customerId,
            error: describeError(failure.error)
          };
          if (isCustomerGraphError(failure.error)) {
            item.code = failure.error.code;
          }
          return item;
        })
      };
      res.json(response);
    })
  );

  uploadsRouter.get(
    "/:customerId",
    validate({ params: customerParamsSchema }),
    (req, res) => {
      const { customerId } = customerParamsSchema.parse(req.params);
      const response: ListUploadRecordsResponse = {
        customer_id: customerId,
        records: coordinator().listRecords(customerId)
      };
      res.json(response);
    }
  );

  return uploadsRouter;
}
