import pino, { type Logger } from "pino";
import { appConfig } from "../config.js";

export type { Logger };

export const logger: Logger = pino({
  level: appConfig.LOG_LEVEL,
  base: { service: "customer-graph-backend" }
});
