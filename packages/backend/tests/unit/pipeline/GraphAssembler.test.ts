import { describe, expect, it } from "vitest";
import type { Relationship } from "@customer-graph/shared";
import { EmptyGraphError } from "../../../src/errors.js";
import { EntityExtractor } from "../../../src/pipeline/EntityExtractor.js";
import { DEFAULT_EXTRACTION_METHOD, GraphAssembler } from "../../../src/pipeline/GraphAssembler.js";
import { entityId, relationshipId } from "../../../src/pipeline/identity.js";
import { advisorRequest, buildSnapshot, fixedClock, silentLogger, timWolffRequest } from "../../helpers/fixtures.js";

describe("GraphAssembler", () => {
  it("computes quality metrics for a snapshot", async () => {
    const snapshot = await buildSnapshot(advisorRequest());

    expect(snapshot.metrics).toEqual({
      entityCount: 6,
      relationshipCount: 4,
      entityTypeCounts: {
        PERSON: 1,
        SKILL: 1,
        CONCEPT: 1,
        BEHAVIORAL_PATTERN: 1,
        PERSONALITY_TRAIT: 1,
        NEED: 1
      },
      relationshipTypeCounts: { SPECIALIZES_IN: 2, DEMONSTRATES: 1, INFLUENCES: 1 },
      entityTypeDiversity: 6,
      relationshipTypeDiversity: 3,
      meanConfidence: 0.8,
      evidenceCoverage: 1,
      meaningfulRelationshipRatio: 1,
      qualityScore: 0.95,
      graphDensity: 0.1333,
      centralEntities: ["Dana Brooks", "certainty", "Financial planning"]
    });
    expect(snapshot.metadata).toEqual({
      createdAt: "2026-03-01T10:00:00.000Z",
      sourceExtractionMethod: DEFAULT_EXTRACTION_METHOD,
      qualityScore: 0.95,
      rejectedEdgeCount: 0
    });
  });

  it("scores the minimal person and needs graph", async () => {
    const snapshot = await buildSnapshot(timWolffRequest());
    expect(snapshot.nodes).toHaveLength(3);
    expect(snapshot.edges).toHaveLength(2);
    expect(snapshot.metrics.qualityScore).toBe(0.7167);
    expect(snapshot.edges.every((edge) => edge.evidence.length > 0)).toBe(true);
  });

  it("rejects an empty entity set", () => {
    const assembler = new GraphAssembler(silentLogger);
    expect(() =>
      assembler.assemble({
        customerId: "cust-001",
        extractionId: "1772359200000_00000001",
        entities: [],
        relationships: { relationships: [], rejectedCount: 0, rejections: [] }
      })
    ).toThrow(EmptyGraphError);
  });

  it("drops dangling and unsupported edges and counts them as rejected", () => {
    const request = timWolffRequest();
    const entities = new EntityExtractor({}, fixedClock).extract(request);
    const personId = entityId("PERSON", "Tim Wolff");
    const certaintyId = entityId("NEED", "certainty");
    const edge = (targetId: string, evidence: string[]): Relationship => ({
      id: relationshipId(personId, "DEMONSTRATES", targetId),
      sourceId: personId,
      targetId,
      type: "DEMONSTRATES",
      confidence: 0.8,
      evidence,
      reasoning: "test",
      source: "needs-analysis",
      customerId: request.customerId,
      extractionId: request.extractionId
    });

    const snapshot = new GraphAssembler(silentLogger).assemble({
      customerId: request.customerId,
      extractionId: request.extractionId,
      entities,
      relationships: {
        relationships: [edge(certaintyId, ["quoted"]), edge("need_missing", ["quoted"]), edge(entityId("NEED", "growth"), [" "])],
        rejectedCount: 2,
        rejections: []
      },
      sourceExtractionMethod: "manual",
      createdAt: fixedClock()
    });

    expect(snapshot.edges.map((item) => item.targetId)).toEqual([certaintyId]);
    expect(snapshot.metadata.rejectedEdgeCount).toBe(4);
    expect(snapshot.metadata.sourceExtractionMethod).toBe("manual");
  });

  it("returns a frozen copy of its input", async () => {
    const request = timWolffRequest();
    const entities = new EntityExtractor({}, fixedClock).extract(request);
    const snapshot = new GraphAssembler(silentLogger).assemble({
      customerId: request.customerId,
      extractionId: request.extractionId,
      entities,
      relationships: { relationships: [], rejectedCount: 0, rejections: [] }
    });

    const first = entities[0];
    if (first) {
      first.label = "Changed";
    }
    expect(snapshot.nodes[0]?.label).toBe("Tim Wolff");
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.nodes[0])).toBe(true);
    expect(Object.isFrozen(snapshot.nodes[0]?.properties)).toBe(true);
    expect(snapshot.metrics.evidenceCoverage).toBe(1);
    expect(snapshot.metrics.meaningfulRelationshipRatio).toBe(0);
  });
});
