import type { ExtractionStore, GraphDatabase, ServiceCheckStatus } from "@customer-graph/shared";
import { appConfig } from "../config.js";
import {
  ensureGraphDatabaseConnected,
  getExtractionStoreSingleton,
  getGraphDatabaseSingleton
} from "./graphRuntime.js";
import { logger } from "../utils/logger.js";

export function isNeo4jConfigured(): boolean {
  return (
    appConfig.NEO4J_URI.trim().length > 0 &&
    appConfig.NEO4J_USER.trim().length > 0 &&
    appConfig.NEO4J_PASSWORD.trim().length > 0
  );
}

interface GraphDatabaseConnectionOptions {
  graphDatabase?: GraphDatabase;
  ensureConnected?: () => Promise<void>;
  isConfigured?: () => boolean;
}

interface ExtractionStoreConnectionOptions {
  extractionStore?: ExtractionStore;
}

export async function checkGraphDatabaseConnection(
  options: GraphDatabaseConnectionOptions = {}
): Promise<ServiceCheckStatus> {
  const isConfigured = options.isConfigured ?? isNeo4jConfigured;
  if (!isConfigured()) {
    return "not_configured";
  }

  const graphDatabase = options.graphDatabase ?? getGraphDatabaseSingleton();
  const ensureConnected =
    options.ensureConnected ??
    (options.graphDatabase ? () => graphDatabase.connect() : () => ensureGraphDatabaseConnected(graphDatabase));

  try {
    await ensureConnected();
    const healthy = await graphDatabase.healthCheck();
    return healthy ? "ok" : "failed";
  } catch (error) {
    logger.warn({ err: error }, "Graph database health check failed");
    return "failed";
  }
}

export async function checkExtractionStoreConnection(
  options: ExtractionStoreConnectionOptions = {}
): Promise<ServiceCheckStatus> {
  const extractionStore = options.extractionStore ?? getExtractionStoreSingleton();

  try {
    await extractionStore.listCustomers();
    return "ok";
  } catch (error) {
    logger.warn({ err: error }, "Extraction store health check failed");
    return "failed";
  }
}
