import type {
  Entity,
  EntityType,
  GraphSnapshot,
  Relationship,
  RelationshipType,
  SnapshotMetrics
} from "@customer-graph/shared";
import { ENTITY_TYPES, RELATIONSHIP_TYPES } from "@customer-graph/shared";
import { EmptyGraphError, EvidenceMissingError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import type { AssemblyInput } from "./types.js";

export const DEFAULT_EXTRACTION_METHOD = "rule-based+similarity";

const QUALITY_WEIGHTS = {
  typeDiversity: 0.4,
  evidenceCoverage: 0.3,
  meaningfulRatio: 0.3
} as const;

/**
 * Combines extracted entities and relationships into an immutable snapshot.
 * Edges without evidence or with an endpoint outside the entity set are
 * dropped here, so every snapshot has full evidence coverage.
 */
export class GraphAssembler {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? defaultLogger;
  }

  assemble(input: AssemblyInput): GraphSnapshot {
    const { customerId, extractionId, entities } = input;
    if (entities.length === 0) {
      throw new EmptyGraphError({ customerId, extractionId });
    }

    const entityIds = new Set(entities.map((entity) => entity.id));
    const edges: Relationship[] = [];
    let droppedDangling = 0;
    let droppedUnsupported = 0;

    for (const edge of input.relationships.relationships) {
      if (!entityIds.has(edge.sourceId) || !entityIds.has(edge.targetId)) {
        droppedDangling += 1;
        continue;
      }
      if (!edge.evidence.some((item) => item.trim().length > 0)) {
        droppedUnsupported += 1;
        this.logger.debug(
          { err: new EvidenceMissingError(edge.id, { customerId, extractionId }) },
          "Dropped edge without evidence at assembly"
        );
        continue;
      }
      edges.push(edge);
    }

    if (droppedDangling > 0) {
      this.logger.warn({ customerId, extractionId, droppedDangling }, "Dropped edges with unknown endpoints");
    }

    const metrics = computeSnapshotMetrics(entities, edges);
    const rejectedEdgeCount = input.relationships.rejectedCount + droppedUnsupported + droppedDangling;

    return deepFreeze({
      customerId,
      extractionId,
      nodes: entities.map((entity) => ({ ...entity, sources: [...entity.sources], properties: { ...entity.properties } })),
      edges: edges.map((edge) => ({ ...edge, evidence: [...edge.evidence] })),
      metrics,
      metadata: {
        createdAt: (input.createdAt ?? new Date()).toISOString(),
        sourceExtractionMethod: input.sourceExtractionMethod ?? DEFAULT_EXTRACTION_METHOD,
        qualityScore: metrics.qualityScore,
        rejectedEdgeCount
      }
    });
  }
}

export function computeSnapshotMetrics(
  entities: readonly Entity[],
  edges: readonly Relationship[]
): SnapshotMetrics {
  const entityTypeCounts: Partial<Record<EntityType, number>> = {};
  for (const entity of entities) {
    entityTypeCounts[entity.type] = (entityTypeCounts[entity.type] ?? 0) + 1;
  }

  const relationshipTypeCounts: Partial<Record<RelationshipType, number>> = {};
  for (const edge of edges) {
    relationshipTypeCounts[edge.type] = (relationshipTypeCounts[edge.type] ?? 0) + 1;
  }

  const entityTypeDiversity = Object.keys(entityTypeCounts).length;
  const relationshipTypeDiversity = Object.keys(relationshipTypeCounts).length;
  const withEvidence = edges.filter((edge) => edge.evidence.some((item) => item.trim().length > 0));
  const evidenceCoverage = edges.length === 0 ? 1 : withEvidence.length / edges.length;
  const meaningful = withEvidence.filter((edge) => edge.type !== "RELATES_TO").length;
  const meaningfulRelationshipRatio = edges.length === 0 ? 0 : meaningful / edges.length;

  const typeDiversity =
    (Math.min(entityTypeDiversity / ENTITY_TYPES.length, 1) +
      Math.min(relationshipTypeDiversity / RELATIONSHIP_TYPES.length, 1)) /
    2;
  const qualityScore = round(
    QUALITY_WEIGHTS.typeDiversity * typeDiversity +
      QUALITY_WEIGHTS.evidenceCoverage * evidenceCoverage +
      QUALITY_WEIGHTS.meaningfulRatio * meaningfulRelationshipRatio
  );

  const meanConfidence =
    entities.length === 0
      ? 0
      : round(entities.reduce((sum, entity) => sum + entity.confidence, 0) / entities.length);

  const possibleEdges = entities.length * (entities.length - 1);
  const graphDensity = possibleEdges === 0 ? 0 : round(edges.length / possibleEdges);

  return {
    entityCount: entities.length,
    relationshipCount: edges.length,
    entityTypeCounts,
    relationshipTypeCounts,
    entityTypeDiversity,
    relationshipTypeDiversity,
    meanConfidence,
    evidenceCoverage: round(evidenceCoverage),
    meaningfulRelationshipRatio: round(meaningfulRelationshipRatio),
    qualityScore,
    graphDensity,
    centralEntities: centralEntities(entities, edges, 3)
  };
}

function centralEntities(entities: readonly Entity[], edges: readonly Relationship[], limit: number): string[] {
  const degree = new Map<string, number>();
  for (const edge of edges) {
    degree.set(edge.sourceId, (degree.get(edge.sourceId) ?? 0) + 1);
    degree.set(edge.targetId, (degree.get(edge.targetId) ?? 0) + 1);
  }

  // Stable sort keeps entity order for equal degree.
  return entities
    .filter((entity) => (degree.get(entity.id) ?? 0) > 0)
    .sort((a, b) => (degree.get(b.id) ?? 0) - (degree.get(a.id) ?? 0))
    .slice(0, limit)
    .map((entity) => entity.label);
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
