import type {
  Entity,
  EntityType,
  ExtractionRequest,
  Relationship,
  RelationshipSource,
  RelationshipType
} from "@customer-graph/shared";
import { EvidenceMissingError } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { matchNeedToBehavior } from "./domainRules.js";
import { normalizeLabel, relationshipId } from "./identity.js";
import type { SimilarityScorer } from "./similarity.js";
import type { RelationshipExtractionResult, RelationshipExtractorOptions } from "./types.js";

interface CandidateRelationship {
  source: Entity;
  target: Entity;
  type: RelationshipType;
  confidence: number;
  evidence: string[];
  reasoning: string;
  origin: RelationshipSource;
}

const defaultOptions: RelationshipExtractorOptions = {
  similarityThreshold: 0.5,
  maxEvidencePerEdge: 3
};

const similarityPairs: ReadonlyArray<[EntityType, EntityType]> = [
  ["SKILL", "CONCEPT"],
  ["BEHAVIORAL_PATTERN", "PERSONALITY_TRAIT"]
];

export class RelationshipExtractor {
  private readonly options: RelationshipExtractorOptions;
  private readonly logger: Logger;

  constructor(
    private readonly scorer: SimilarityScorer,
    options: Partial<RelationshipExtractorOptions> = {},
    logger?: Logger
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.logger = logger ?? defaultLogger;
  }

  async extract(entities: Entity[], request: ExtractionRequest): Promise<RelationshipExtractionResult> {
    const sentences = splitSentences(request.fileAnalysis.rawText ?? "");
    const primary =
      entities.find((entity) => entity.type === "PERSON" && entity.properties.primary === true) ??
      entities.find((entity) => entity.type === "PERSON");

    const candidates: CandidateRelationship[] = [];
    if (primary) {
      candidates.push(...this.specializations(primary, entities, sentences));
      candidates.push(...this.demonstrations(primary, entities, request));
    }
    candidates.push(...this.influences(entities, sentences));
    candidates.push(...(await this.similarities(entities, sentences)));

    const rejections: EvidenceMissingError[] = [];
    const merged = new Map<string, Relationship>();

    for (const candidate of candidates) {
      if (candidate.source.id === candidate.target.id) {
        continue;
      }

      const id = relationshipId(candidate.source.id, candidate.type, candidate.target.id);
      const evidence = cleanEvidence(candidate.evidence);
      if (evidence.length === 0) {
        rejections.push(
          new EvidenceMissingError(id, {
            customerId: request.customerId,
            extractionId: request.extractionId
          })
        );
        continue;
      }

      const existing = merged.get(id);
      if (existing) {
        merged.set(id, {
          ...existing,
          confidence: Math.max(existing.confidence, candidate.confidence),
          evidence: cleanEvidence([...existing.evidence, ...evidence])
        });
        continue;
      }

      merged.set(id, {
        id,
        sourceId: candidate.source.id,
        targetId: candidate.target.id,
        type: candidate.type,
        confidence: candidate.confidence,
        evidence,
        reasoning: candidate.reasoning,
        source: candidate.origin,
        customerId: request.customerId,
        extractionId: request.extractionId
      });
    }

    if (rejections.length > 0) {
      this.logger.debug(
        { customerId: request.customerId, extractionId: request.extractionId, rejected: rejections.length },
        "Dropped relationships without evidence"
      );
    }

    return {
      relationships: [...merged.values()],
      rejectedCount: rejections.length,
      rejections
    };
  }

  private specializations(primary: Entity, entities: Entity[], sentences: string[]): CandidateRelationship[] {
    return entities
      .filter(
        (entity) =>
          (entity.type === "SKILL" || entity.type === "CONCEPT") && entity.sources.includes("file-analysis")
      )
      .map((target): CandidateRelationship => {
        const mentions = this.sentencesMentioning(sentences, [target.label]);
        return {
          source: primary,
          target,
          type: "SPECIALIZES_IN",
          confidence: Math.min(primary.confidence, target.confidence),
          evidence: mentions.length > 0 ? mentions : phrasesOf(target),
          reasoning: `${primary.label} is associated with ${target.label}`,
          origin: "file-analysis"
        };
      });
  }

  private demonstrations(
    primary: Entity,
    entities: Entity[],
    request: ExtractionRequest
  ): CandidateRelationship[] {
    const quotes = new Map<string, string[]>();
    for (const [need, items] of Object.entries(request.needsAnalysis.evidence ?? {})) {
      quotes.set(normalizeLabel(need), items);
    }

    return entities
      .filter((entity) => entity.type === "NEED")
      .map((need): CandidateRelationship => {
        const score = need.properties.score;
        const supplied = quotes.get(normalizeLabel(need.label)) ?? [];
        const fallback = typeof score === "number" ? [`${primary.label} scored ${score} on ${need.label}`] : [];
        return {
          source: primary,
          target: need,
          type: "DEMONSTRATES",
          confidence: need.confidence,
          evidence: cleanEvidence(supplied).length > 0 ? supplied : fallback,
          reasoning: `${need.label} scored above the need threshold`,
          origin: "needs-analysis"
        };
      });
  }

  private influences(entities: Entity[], sentences: string[]): CandidateRelationship[] {
    const needs = entities.filter((entity) => entity.type === "NEED");
    const patterns = entities.filter((entity) => entity.type === "BEHAVIORAL_PATTERN");
    const candidates: CandidateRelationship[] = [];

    for (const need of needs) {
      for (const pattern of patterns) {
        const match = matchNeedToBehavior(need.label, pattern.label);
        if (!match) {
          continue;
        }

        candidates.push({
          source: need,
          target: pattern,
          type: "INFLUENCES",
          confidence: Math.min(need.confidence, pattern.confidence),
          evidence: [
            ...phrasesOf(pattern),
            ...this.sentencesMentioning(sentences, [pattern.label])
          ],
          reasoning: `Need "${match.need}" drives behaviour matching "${match.keyword}"`,
          origin: "needs-analysis"
        });
      }
    }

    return candidates;
  }

  private async similarities(entities: Entity[], sentences: string[]): Promise<CandidateRelationship[]> {
    const candidates: CandidateRelationship[] = [];

    for (const [leftType, rightType] of similarityPairs) {
      const left = entities.filter((entity) => entity.type === leftType);
      const right = entities.filter((entity) => entity.type === rightType);

      for (const a of left) {
        for (const b of right) {
          const score = await this.scorer.scoreSimilarity(a, b);
          if (score <= this.options.similarityThreshold) {
            continue;
          }

          const mentions = this.sentencesMentioning(sentences, [a.label, b.label]);
          candidates.push({
            source: a,
            target: b,
            type: "RELATES_TO",
            confidence: score,
            evidence: mentions.length > 0 ? mentions : [...phrasesOf(a), ...phrasesOf(b)],
            reasoning: `Similarity ${score} between ${a.label} and ${b.label}`,
            origin: "similarity"
          });
        }
      }
    }

    return candidates;
  }

  private sentencesMentioning(sentences: string[], labels: string[]): string[] {
    const needles = labels.map((label) => normalizeLabel(label));
    return sentences
      .filter((sentence) => {
        const haystack = normalizeLabel(sentence);
        return needles.every((needle) => haystack.includes(needle));
      })
      .slice(0, this.options.maxEvidencePerEdge);
  }
}

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

function phrasesOf(entity: Entity): string[] {
  const phrase = entity.properties.phrase;
  return typeof phrase === "string" ? [phrase] : [];
}

function cleanEvidence(items: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const item of items) {
    const trimmed = item.trim();
    if (trimmed.length === 0 || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    result.push(trimmed);
  }
  return result;
}
