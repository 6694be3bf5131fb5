export { createApp, type CreateAppOptions } from "./app.js";
export * from "./errors.js";
export { EntityExtractor } from "./pipeline/EntityExtractor.js";
export { RelationshipExtractor } from "./pipeline/RelationshipExtractor.js";
export { GraphAssembler, computeSnapshotMetrics } from "./pipeline/GraphAssembler.js";
export { ExtractionPipeline, type ExtractionPipelineDeps } from "./pipeline/ExtractionPipeline.js";
export {
  DisabledSimilarityScorer,
  LexicalSimilarityScorer,
  LlmSimilarityScorer,
  type SimilarityScorer
} from "./pipeline/similarity.js";
export { createExtractionId, entityId, relationshipId } from "./pipeline/identity.js";
export type {
  EntityExtractorOptions,
  ExtractionPipelineResult,
  PipelineStatusEvent,
  RelationshipExtractorOptions
} from "./pipeline/types.js";
export { FileExtractionStore } from "./store/FileExtractionStore.js";
export { Neo4jGraphDatabase, type Neo4jGraphDatabaseConfig } from "./store/Neo4jGraphDatabase.js";
export { SqliteUploadRecordStore, type UploadRecordStoreLike } from "./services/UploadRecordStore.js";
export { InMemoryUploadRecordStore } from "./services/InMemoryUploadRecordStore.js";
export {
  BulkUploadCoordinator,
  type BulkUploadCoordinatorDeps,
  type BulkUploadCoordinatorOptions,
  type MultiCustomerUploadResult
} from "./upload/BulkUploadCoordinator.js";
export { NoopMetricsSink, PrometheusMetricsSink, type MetricsSink } from "./observability/metrics.js";
