import type { ExtractionStore, GraphDatabase } from "@customer-graph/shared";
import { appConfig } from "../config.js";
import { PrometheusMetricsSink } from "../observability/metrics.js";
import { EntityExtractor } from "../pipeline/EntityExtractor.js";
import { ExtractionPipeline } from "../pipeline/ExtractionPipeline.js";
import { RelationshipExtractor } from "../pipeline/RelationshipExtractor.js";
import {
  DisabledSimilarityScorer,
  LexicalSimilarityScorer,
  LlmSimilarityScorer,
  type SimilarityScorer
} from "../pipeline/similarity.js";
import { LLMService } from "../services/LLMService.js";
import { SqliteUploadRecordStore, type UploadRecordStoreLike } from "../services/UploadRecordStore.js";
import { FileExtractionStore } from "../store/FileExtractionStore.js";
import { Neo4jGraphDatabase } from "../store/Neo4jGraphDatabase.js";
import { BulkUploadCoordinator } from "../upload/BulkUploadCoordinator.js";

let extractionStoreSingleton: ExtractionStore | null = null;
let graphDatabaseSingleton: GraphDatabase | null = null;
let recordStoreSingleton: UploadRecordStoreLike | null = null;
let metricsSingleton: PrometheusMetricsSink | null = null;
let pipelineSingleton: ExtractionPipeline | null = null;
let coordinatorSingleton: BulkUploadCoordinator | null = null;
let connectPromise: Promise<void> | null = null;

export function getExtractionStoreSingleton(): ExtractionStore {
  if (!extractionStoreSingleton) {
    extractionStoreSingleton = new FileExtractionStore(appConfig.EXTRACTION_STORE_DIR);
  }

  return extractionStoreSingleton;
}

export function getGraphDatabaseSingleton(): GraphDatabase {
  if (!graphDatabaseSingleton) {
    graphDatabaseSingleton = new Neo4jGraphDatabase({
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD,
      database: appConfig.NEO4J_DATABASE
    });
  }

  return graphDatabaseSingleton;
}

export function getUploadRecordStoreSingleton(): UploadRecordStoreLike {
  if (!recordStoreSingleton) {
    recordStoreSingleton = new SqliteUploadRecordStore({ dbPath: appConfig.UPLOAD_DB_PATH });
  }

  return recordStoreSingleton;
}

export function getMetricsSingleton(): PrometheusMetricsSink {
  if (!metricsSingleton) {
    metricsSingleton = new PrometheusMetricsSink({
      prefix: appConfig.METRICS_PREFIX,
      collectDefaults: appConfig.NODE_ENV !== "test"
    });
  }

  return metricsSingleton;
}

export function createSimilarityScorer(): SimilarityScorer {
  switch (appConfig.SIMILARITY_PROVIDER) {
    case "llm":
      return new LlmSimilarityScorer(LLMService.fromEnv());
    case "disabled":
      return new DisabledSimilarityScorer();
    default:
      return new LexicalSimilarityScorer();
  }
}

export function getExtractionPipelineSingleton(): ExtractionPipeline {
  if (!pipelineSingleton) {
    pipelineSingleton = new ExtractionPipeline(getExtractionStoreSingleton(), {
      entityExtractor: new EntityExtractor({ needScoreThreshold: appConfig.NEED_SCORE_THRESHOLD }),
      relationshipExtractor: new RelationshipExtractor(createSimilarityScorer(), {
        similarityThreshold: appConfig.SIMILARITY_THRESHOLD
      }),
      metrics: getMetricsSingleton()
    });
  }

  return pipelineSingleton;
}

export function getUploadCoordinatorSingleton(): BulkUploadCoordinator {
  if (!coordinatorSingleton) {
    coordinatorSingleton = new BulkUploadCoordinator(
      {
        extractionStore: getExtractionStoreSingleton(),
        graphDatabase: getGraphDatabaseSingleton(),
        recordStore: getUploadRecordStoreSingleton(),
        metrics: getMetricsSingleton()
      },
      {
        maxAttempts: appConfig.UPLOAD_MAX_ATTEMPTS,
        retryDelayMs: appConfig.UPLOAD_RETRY_DELAY_MS,
        callTimeoutMs: appConfig.UPLOAD_TIMEOUT_MS,
        callRetries: appConfig.UPLOAD_CALL_RETRIES,
        customerConcurrency: appConfig.UPLOAD_CUSTOMER_CONCURRENCY
      }
    );
  }

  return coordinatorSingleton;
}

export async function ensureGraphDatabaseConnected(
  graphDatabase: GraphDatabase = getGraphDatabaseSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = graphDatabase.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}
