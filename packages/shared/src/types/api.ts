import type { CustomerManifest, GraphProperties } from "../store.js";
import type { GraphSnapshot, SnapshotMetrics } from "./graph.js";
import type { ExtractionUploadOutcome, UploadRecord } from "./upload.js";

export interface ApiErrorResponse {
  error: string;
  code?: string;
  details?: unknown;
}

export interface RunExtractionResponse {
  customer_id: string;
  extraction_id: string;
  node_count: number;
  edge_count: number;
  rejected_edge_count: number;
  quality_score: number;
  metrics: SnapshotMetrics;
}

export interface ListExtractionsResponse {
  customer_id: string;
  manifest: CustomerManifest | null;
  extractions: Array<{ extraction_id: string }>;
}

export interface GetExtractionResponse {
  snapshot: GraphSnapshot;
}

export interface BulkUploadResponse {
  customer_id: string;
  dry_run: boolean;
  processed: number;
  succeeded: number;
  failed: number;
  duration_seconds: number;
  cancelled: boolean;
  outcomes: ExtractionUploadOutcome[];
}

export interface BatchUploadResponse {
  results: BulkUploadResponse[];
  failures: Array<{ customer_id: string; error: string; code?: string }>;
}

export interface ListUploadRecordsResponse {
  customer_id: string;
  records: UploadRecord[];
}

export type CustomerGraphView = "nodes" | "edges" | "summary";

export interface CustomerGraphSummary {
  nodeCount: number;
  edgeCount: number;
  nodeTypeDistribution: Record<string, number>;
  edgeTypeDistribution: Record<string, number>;
  extractionIds: string[];
}

export interface CustomerGraphResponse {
  customer_id: string;
  view: CustomerGraphView;
  nodes?: Array<{ id: string; type: string; properties: GraphProperties }>;
  edges?: Array<{ id: string; type: string; from: string; to: string; properties: GraphProperties }>;
  summary?: CustomerGraphSummary;
}

export type ServiceCheckStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    graphDatabase: ServiceCheckStatus;
    extractionStore: ServiceCheckStatus;
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}
