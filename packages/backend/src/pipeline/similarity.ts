import type { Entity } from "@customer-graph/shared";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { normalizeLabel } from "./identity.js";

/**
 * Scores how related two entities are, in [0, 1]. The relationship extractor
 * emits RELATES_TO only above its configured threshold.
 */
export interface SimilarityScorer {
  scoreSimilarity(a: Entity, b: Entity): Promise<number>;
}

const defaultDomainGroups: Record<string, string[]> = {
  finance: ["financial", "finance", "investment", "insurance", "planning", "advisory", "wealth", "retirement", "portfolio"],
  technology: ["software", "engineering", "data", "cloud", "technology", "automation", "analytics"],
  leadership: ["leadership", "management", "strategy", "team", "mentoring", "coaching"],
  wellbeing: ["health", "fitness", "wellbeing", "balance", "family", "mindfulness"],
  drive: ["ambitious", "driven", "competitive", "achiever", "goal", "disciplined"],
  openness: ["creative", "curious", "innovative", "explorer", "learner", "adventurous"],
  care: ["empathetic", "helper", "supportive", "caring", "collaborative", "social"],
  caution: ["cautious", "analytical", "careful", "planner", "methodical", "risk"]
};

export interface LexicalSimilarityOptions {
  domainGroups?: Record<string, string[]>;
  domainMatchScore?: number;
}

/**
 * Deterministic scorer: blends edit distance, token overlap and a hashed
 * bag-of-words cosine, and lifts pairs that share a domain keyword group.
 */
export class LexicalSimilarityScorer implements SimilarityScorer {
  private readonly domainGroups: Record<string, string[]>;
  private readonly domainMatchScore: number;

  constructor(options: LexicalSimilarityOptions = {}) {
    this.domainGroups = options.domainGroups ?? defaultDomainGroups;
    this.domainMatchScore = options.domainMatchScore ?? 0.7;
  }

  async scoreSimilarity(a: Entity, b: Entity): Promise<number> {
    return this.score(a.label, b.label);
  }

  score(labelA: string, labelB: string): number {
    const normA = normalizeLabel(labelA);
    const normB = normalizeLabel(labelB);
    if (normA.length === 0 || normB.length === 0) {
      return 0;
    }
    if (normA === normB) {
      return 1;
    }

    const lexical =
      (normalizedLevenshtein(normA, normB) +
        jaccardSimilarity(normA, normB) +
        cosineSimilarity(textVector(normA), textVector(normB))) /
      3;
    const domain = this.sharesDomain(normA, normB) ? this.domainMatchScore : 0;
    return roundScore(Math.max(lexical, domain));
  }

  private sharesDomain(a: string, b: string): boolean {
    const tokensA = tokenize(a);
    const tokensB = tokenize(b);
    return Object.values(this.domainGroups).some(
      (keywords) =>
        keywords.some((keyword) => tokensA.some((token) => token.startsWith(keyword))) &&
        keywords.some((keyword) => tokensB.some((token) => token.startsWith(keyword)))
    );
  }
}

export class DisabledSimilarityScorer implements SimilarityScorer {
  async scoreSimilarity(_a: Entity, _b: Entity): Promise<number> {
    return 0;
  }
}

/**
 * Asks the language model for a relatedness score and falls back to a
 * deterministic scorer when the call or its output is unusable.
 */
export class LlmSimilarityScorer implements SimilarityScorer {
  private readonly fallback: SimilarityScorer;
  private readonly logger: Logger;

  constructor(
    private readonly llmService: LLMServiceLike,
    options: { fallback?: SimilarityScorer; logger?: Logger } = {}
  ) {
    this.fallback = options.fallback ?? new LexicalSimilarityScorer();
    this.logger = options.logger ?? defaultLogger;
  }

  async scoreSimilarity(a: Entity, b: Entity): Promise<number> {
    try {
      const result = await this.llmService.scoreRelatedness(
        { label: a.label, type: a.type },
        { label: b.label, type: b.type }
      );
      return roundScore(Math.min(1, Math.max(0, result.score)));
    } catch (error) {
      this.logger.warn(
        { err: error, source: a.id, target: b.id },
        "LLM similarity failed, using fallback scorer"
      );
      return this.fallback.scoreSimilarity(a, b);
    }
  }
}

function roundScore(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

function normalizedLevenshtein(a: string, b: string): number {
  const distance = levenshteinDistance(a, b);
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) {
    return 1;
  }
  return 1 - distance / maxLength;
}

function levenshteinDistance(a: string, b: string): number {
  let prev = Array.from({ length: b.length + 1 }, (_, idx) => idx);

  for (let i = 1; i <= a.length; i += 1) {
    const current = new Array<number>(b.length + 1);
    current[0] = i;
    for (let j = 1; j <= b.length; j += 1) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      const deletion = (prev[j] ?? 0) + 1;
      const insertion = (current[j - 1] ?? 0) + 1;
      const substitution = (prev[j - 1] ?? 0) + cost;
      current[j] = Math.min(deletion, insertion, substitution);
    }
    prev = current;
  }

  return prev[b.length] ?? 0;
}

function jaccardSimilarity(a: string, b: string): number {
  const setA = new Set(tokenize(a));
  const setB = new Set(tokenize(b));
  if (setA.size === 0 && setB.size === 0) {
    return 1;
  }

  let intersection = 0;
  for (const token of setA) {
    if (setB.has(token)) {
      intersection += 1;
    }
  }

  const union = new Set([...setA, ...setB]).size;
  return union === 0 ? 0 : intersection / union;
}

function textVector(text: string, dimension = 128): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const token of tokenize(text)) {
    const idx = hashToken(token) % dimension;
    vector[idx] = (vector[idx] ?? 0) + 1;
  }
  return vector;
}

function hashToken(token: string): number {
  let hash = 0;
  for (let i = 0; i < token.length; i += 1) {
    hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
  }
  return hash;
}

function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i += 1) {
    const valueA = a[i] ?? 0;
    const valueB = b[i] ?? 0;
    dot += valueA * valueB;
    normA += valueA * valueA;
    normB += valueB * valueB;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
