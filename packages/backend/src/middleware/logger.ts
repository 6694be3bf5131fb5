import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

export const REQUEST_ID_HEADER = "x-request-id";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startTime = Date.now();
  const incoming = req.get(REQUEST_ID_HEADER);
  const requestId = incoming && incoming.length <= 128 ? incoming : randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    const durationMs = Date.now() - startTime;
    const fields = {
      requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs
    };
    if (res.statusCode >= 500) {
      logger.error(fields, "HTTP request");
    } else {
      logger.info(fields, "HTTP request");
    }
  });

  next();
};
