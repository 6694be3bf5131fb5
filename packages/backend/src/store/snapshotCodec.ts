import { z } from "zod";
import type { CustomerManifest, Entity, GraphSnapshot, Relationship } from "@customer-graph/shared";
import { ENTITY_TYPES, RELATIONSHIP_TYPES } from "@customer-graph/shared";
import { computeSnapshotMetrics, deepFreeze } from "../pipeline/GraphAssembler.js";

const entitySourceSchema = z.enum(["file-analysis", "needs-analysis"]);

const storedNodeSchema = z.object({
  id: z.string().min(1),
  type: z.enum(ENTITY_TYPES),
  label: z.string().min(1),
  confidence: z.number().min(0).max(1),
  source: entitySourceSchema,
  sources: z.array(entitySourceSchema).min(1),
  properties: z.record(z.unknown()).default({}),
  customer_id: z.string().min(1),
  extraction_id: z.string().min(1),
  created_at: z.string()
});

const storedEdgeSchema = z.object({
  id: z.string().min(1),
  source_id: z.string().min(1),
  target_id: z.string().min(1),
  type: z.enum(RELATIONSHIP_TYPES),
  confidence: z.number().min(0).max(1),
  evidence: z.array(z.string()),
  reasoning: z.string().default(""),
  source: z.enum(["file-analysis", "needs-analysis", "similarity"]),
  customer_id: z.string().min(1),
  extraction_id: z.string().min(1)
});

const storedMetadataSchema = z.object({
  customer_id: z.string().min(1),
  extraction_id: z.string().min(1),
  created_at: z.string(),
  source_extraction_method: z.string(),
  quality_score: z.number(),
  rejected_edge_count: z.number().int().min(0).default(0),
  node_count: z.number().int().min(0),
  edge_count: z.number().int().min(0)
});

const manifestSchema = z.object({
  customerId: z.string().min(1),
  createdAt: z.string(),
  lastUpdated: z.string(),
  extractions: z.array(
    z.object({
      extractionId: z.string().min(1),
      prefix: z.string(),
      nodeCount: z.number().int().min(0),
      edgeCount: z.number().int().min(0),
      createdAt: z.string()
    })
  )
});

export type StoredNode = z.infer<typeof storedNodeSchema>;
export type StoredEdge = z.infer<typeof storedEdgeSchema>;
export type StoredMetadata = z.infer<typeof storedMetadataSchema>;

export interface StoredSnapshotDocuments {
  nodes: StoredNode[];
  edges: StoredEdge[];
  metadata: StoredMetadata;
}

export function encodeSnapshot(snapshot: GraphSnapshot): StoredSnapshotDocuments {
  return {
    nodes: snapshot.nodes.map((node) => ({
      id: node.id,
      type: node.type,
      label: node.label,
      confidence: node.confidence,
      source: node.source,
      sources: [...node.sources],
      properties: { ...node.properties },
      customer_id: node.customerId,
      extraction_id: node.extractionId,
      created_at: node.createdAt
    })),
    edges: snapshot.edges.map((edge) => ({
      id: edge.id,
      source_id: edge.sourceId,
      target_id: edge.targetId,
      type: edge.type,
      confidence: edge.confidence,
      evidence: [...edge.evidence],
      reasoning: edge.reasoning,
      source: edge.source,
      customer_id: edge.customerId,
      extraction_id: edge.extractionId
    })),
    metadata: {
      customer_id: snapshot.customerId,
      extraction_id: snapshot.extractionId,
      created_at: snapshot.metadata.createdAt,
      source_extraction_method: snapshot.metadata.sourceExtractionMethod,
      quality_score: snapshot.metadata.qualityScore,
      rejected_edge_count: snapshot.metadata.rejectedEdgeCount,
      node_count: snapshot.nodes.length,
      edge_count: snapshot.edges.length
    }
  };
}

/**
 * Parses the three stored documents back into a frozen snapshot. Metrics are
 * recomputed from nodes and edges; zod errors propagate to the caller.
 */
export function decodeSnapshot(raw: { nodes: unknown; edges: unknown; metadata: unknown }): GraphSnapshot {
  const nodes = z.array(storedNodeSchema).parse(raw.nodes);
  const edges = z.array(storedEdgeSchema).parse(raw.edges);
  const metadata = storedMetadataSchema.parse(raw.metadata);

  const entities: Entity[] = nodes.map((node) => ({
    id: node.id,
    type: node.type,
    label: node.label,
    confidence: node.confidence,
    source: node.source,
    sources: node.sources,
    properties: node.properties,
    customerId: node.customer_id,
    extractionId: node.extraction_id,
    createdAt: node.created_at
  }));

  const relationships: Relationship[] = edges.map((edge) => ({
    id: edge.id,
    sourceId: edge.source_id,
    targetId: edge.target_id,
    type: edge.type,
    confidence: edge.confidence,
    evidence: edge.evidence,
    reasoning: edge.reasoning,
    source: edge.source,
    customerId: edge.customer_id,
    extractionId: edge.extraction_id
  }));

  return deepFreeze({
    customerId: metadata.customer_id,
    extractionId: metadata.extraction_id,
    nodes: entities,
    edges: relationships,
    metrics: computeSnapshotMetrics(entities, relationships),
    metadata: {
      createdAt: metadata.created_at,
      sourceExtractionMethod: metadata.source_extraction_method,
      qualityScore: metadata.quality_score,
      rejectedEdgeCount: metadata.rejected_edge_count
    }
  });
}

export function decodeManifest(raw: unknown): CustomerManifest {
  return manifestSchema.parse(raw);
}

/** Structural checks run before a snapshot is uploaded or counted in a dry run. */
export function validateSnapshot(snapshot: GraphSnapshot): string[] {
  const problems: string[] = [];
  if (snapshot.nodes.length === 0) {
    problems.push("snapshot has no nodes");
  }

  const ids = new Set<string>();
  for (const node of snapshot.nodes) {
    if (ids.has(node.id)) {
      problems.push(`duplicate node id ${node.id}`);
    }
    ids.add(node.id);
    if (node.customerId !== snapshot.customerId) {
      problems.push(`node ${node.id} belongs to customer ${node.customerId}`);
    }
  }

  for (const edge of snapshot.edges) {
    if (!ids.has(edge.sourceId) || !ids.has(edge.targetId)) {
      problems.push(`edge ${edge.id} references a missing node`);
    }
    if (!edge.evidence.some((item) => item.trim().length > 0)) {
      problems.push(`edge ${edge.id} has no evidence`);
    }
    if (edge.customerId !== snapshot.customerId) {
      problems.push(`edge ${edge.id} belongs to customer ${edge.customerId}`);
    }
  }

  return problems;
}
