import type { GraphSnapshot, SnapshotRef } from "./types/graph.js";

export interface ManifestEntry {
  extractionId: string;
  prefix: string;
  nodeCount: number;
  edgeCount: number;
  createdAt: string;
}

export interface CustomerManifest {
  customerId: string;
  createdAt: string;
  lastUpdated: string;
  extractions: ManifestEntry[];
}

/**
 * Object storage for graph snapshots, keyed by customer and extraction id.
 * `writeSnapshot` must be all-or-nothing: readers either see the complete
 * snapshot or no snapshot at all.
 */
export interface ExtractionStore {
  writeSnapshot(snapshot: GraphSnapshot): Promise<void>;
  readSnapshot(customerId: string, extractionId: string): Promise<GraphSnapshot | null>;
  /** Sorted ascending by extraction id, which sorts by creation time. */
  listSnapshots(customerId: string): Promise<SnapshotRef[]>;
  listCustomers(): Promise<string[]>;
  readManifest(customerId: string): Promise<CustomerManifest | null>;
}

export type GraphPropertyValue = string | number | boolean | null | string[];

export interface GraphProperties {
  customerId: string;
  extractionId: string;
  [key: string]: GraphPropertyValue;
}

export type GraphRecordKind = "vertex" | "edge";

export interface GraphRecord {
  kind: GraphRecordKind;
  id: string;
  type: string;
  from?: string;
  to?: string;
  properties: GraphProperties;
}

/**
 * Minimal graph database capability. Upserts are keyed by id so that
 * repeating a write never creates a duplicate. Edges require both endpoints
 * to exist already.
 */
export interface GraphDatabase {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  upsertVertex(id: string, type: string, properties: GraphProperties): Promise<void>;
  upsertEdge(
    id: string,
    from: string,
    to: string,
    type: string,
    properties: GraphProperties
  ): Promise<void>;
  queryByCustomer(customerId: string, kind: GraphRecordKind): Promise<GraphRecord[]>;
}
