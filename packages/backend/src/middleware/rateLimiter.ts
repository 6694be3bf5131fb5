import rateLimit, { type RateLimitRequestHandler } from "express-rate-limit";
import type { ApiErrorResponse } from "@customer-graph/shared";
import { appConfig } from "../config.js";

export interface RateLimiterOptions {
  windowMs: number;
  max: number;
}

export function createRateLimiter(options: RateLimiterOptions): RateLimitRequestHandler {
  const body: ApiErrorResponse = { error: "Too many requests", code: "RATE_LIMITED" };
  return rateLimit({
    windowMs: options.windowMs,
    max: options.max,
    standardHeaders: true,
    legacyHeaders: false,
    // Health probes are never throttled.
    skip: (req) => req.path.startsWith("/health"),
    message: body
  });
}

export const apiRateLimiter = createRateLimiter({
  windowMs: appConfig.RATE_LIMIT_WINDOW_MS,
  max: appConfig.RATE_LIMIT_MAX
});
