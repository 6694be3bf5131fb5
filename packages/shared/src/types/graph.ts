export const ENTITY_TYPES = [
  "PERSON",
  "SKILL",
  "CONCEPT",
  "BEHAVIORAL_PATTERN",
  "PERSONALITY_TRAIT",
  "NEED"
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export const RELATIONSHIP_TYPES = [
  "SPECIALIZES_IN",
  "DEMONSTRATES",
  "INFLUENCES",
  "RELATES_TO"
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export type EntitySource = "file-analysis" | "needs-analysis";

export type RelationshipSource = EntitySource | "similarity";

export interface Entity {
  id: string;
  type: EntityType;
  label: string;
  confidence: number;
  /** First attribution; always equal to `sources[0]`. */
  source: EntitySource;
  sources: EntitySource[];
  properties: Record<string, unknown>;
  customerId: string;
  extractionId: string;
  createdAt: string;
}

export interface Relationship {
  id: string;
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  confidence: number;
  evidence: string[];
  reasoning: string;
  source: RelationshipSource;
  customerId: string;
  extractionId: string;
}

export interface SnapshotMetrics {
  entityCount: number;
  relationshipCount: number;
  entityTypeCounts: Partial<Record<EntityType, number>>;
  relationshipTypeCounts: Partial<Record<RelationshipType, number>>;
  entityTypeDiversity: number;
  relationshipTypeDiversity: number;
  meanConfidence: number;
  evidenceCoverage: number;
  meaningfulRelationshipRatio: number;
  qualityScore: number;
  graphDensity: number;
  centralEntities: string[];
}

export interface SnapshotMetadata {
  createdAt: string;
  sourceExtractionMethod: string;
  qualityScore: number;
  rejectedEdgeCount: number;
}

export interface GraphSnapshot {
  customerId: string;
  extractionId: string;
  nodes: readonly Entity[];
  edges: readonly Relationship[];
  metrics: SnapshotMetrics;
  metadata: SnapshotMetadata;
}

export interface SnapshotRef {
  customerId: string;
  extractionId: string;
}
