import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from "express";
import type { ApiErrorResponse } from "@customer-graph/shared";
import { isCustomerGraphError, type CustomerGraphError } from "../errors.js";
import { logger } from "../utils/logger.js";

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Forwards a rejected handler promise to the error middleware. */
export const asyncHandler = (handler: AsyncRequestHandler): RequestHandler => {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
};

export function statusForError(error: CustomerGraphError): number {
  switch (error.code) {
    case "INVALID_KEY_COMPONENT":
      return 400;
    case "SNAPSHOT_NOT_FOUND":
      return 404;
    case "CROSS_CUSTOMER_VIOLATION":
    case "SNAPSHOT_EXISTS":
    case "INVALID_STATE_TRANSITION":
      return 409;
    case "MISSING_PRIMARY_SUBJECT":
    case "EMPTY_GRAPH":
    case "EVIDENCE_MISSING":
    case "INVALID_SNAPSHOT":
      return 422;
    case "UPLOAD_TIMEOUT":
    case "PARTIAL_UPLOAD_FAILURE":
      return 503;
  }
}

/** Client errors raised by body parsing carry their own 4xx status. */
function clientErrorStatus(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status >= 400 && error.status < 500 ? error.status : null;
  }
  return null;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (isCustomerGraphError(err)) {
    const status = statusForError(err);
    if (status >= 500) {
      logger.error({ err, code: err.code }, "Request failed");
    } else {
      logger.warn({ code: err.code, context: err.context }, err.message);
    }
    const body: ApiErrorResponse = { error: err.message, code: err.code, details: err.context };
    res.status(status).json(body);
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    const body: ApiErrorResponse = {
      error: clientStatus === 413 ? "Request body too large" : "Malformed request body"
    };
    res.status(clientStatus).json(body);
    return;
  }

  logger.error({ err }, "Unhandled error");
  const body: ApiErrorResponse = { error: "Internal server error" };
  res.status(500).json(body);
};
