import pino from "pino";
import type { ExtractionRequest, ExtractionStore, GraphSnapshot } from "@customer-graph/shared";
import { EntityExtractor } from "../../src/pipeline/EntityExtractor.js";
import { GraphAssembler } from "../../src/pipeline/GraphAssembler.js";
import { RelationshipExtractor } from "../../src/pipeline/RelationshipExtractor.js";
import { DisabledSimilarityScorer } from "../../src/pipeline/similarity.js";

export const silentLogger = pino({ level: "silent" });

export const fixedClock = (): Date => new Date("2026-03-01T10:00:00.000Z");

export function timWolffRequest(customerId = "cust-001", extractionId = "1772359200000_0000abcd"): ExtractionRequest {
  return {
    customerId,
    extractionId,
    fileAnalysis: { customerName: "Tim Wolff" },
    needsAnalysis: { needsScores: { certainty: 0.8, growth: 0.6 } }
  };
}

/** A richer request touching every entity and relationship type. */
export function advisorRequest(customerId = "cust-002", extractionId = "1772359200000_0000beef"): ExtractionRequest {
  return {
    customerId,
    extractionId,
    fileAnalysis: {
      customerName: "Dana Brooks",
      confidence: 0.9,
      rawText:
        "Dana Brooks works on Financial planning for young families. She wants to grow her Wealth management practice.",
      keyInsights: {
        skillsAndCompetencies: ["Financial planning"],
        mainThemes: ["Wealth management"]
      }
    },
    needsAnalysis: {
      subjectName: "Dana Brooks",
      confidence: 0.7,
      needsScores: { certainty: 0.75, variety: 0.1 },
      dominantNeeds: [["certainty", 0.75]],
      behavioralPatterns: ["Strategic planner"],
      personalityTraits: ["Methodical"],
      evidence: { certainty: ["Prefers long-term guaranteed products."] }
    }
  };
}

export async function buildSnapshot(request: ExtractionRequest): Promise<GraphSnapshot> {
  const entities = new EntityExtractor({}, fixedClock).extract(request);
  const relationships = await new RelationshipExtractor(new DisabledSimilarityScorer(), {}, silentLogger).extract(
    entities,
    request
  );
  return new GraphAssembler(silentLogger).assemble({
    customerId: request.customerId,
    extractionId: request.extractionId,
    entities,
    relationships,
    createdAt: fixedClock()
  });
}

export function extractionIdAt(index: number): string {
  return `${String(1772359200000 + index * 1000).padStart(13, "0")}_${index.toString(16).padStart(8, "0")}`;
}

/** Writes `count` Tim Wolff style snapshots for one customer. */
export async function seedExtractions(store: ExtractionStore, customerId: string, count: number): Promise<string[]> {
  const ids: string[] = [];
  for (let index = 0; index < count; index += 1) {
    const extractionId = extractionIdAt(index);
    await store.writeSnapshot(await buildSnapshot(timWolffRequest(customerId, extractionId)));
    ids.push(extractionId);
  }
  return ids;
}
