import type {
  Entity,
  EntitySource,
  EntityType,
  ExtractionRequest,
  FileAnalysis,
  NeedsAnalysis
} from "@customer-graph/shared";
import { MissingPrimarySubjectError } from "../errors.js";
import { entityId, entityKey, normalizeLabel } from "./identity.js";
import type { EntityExtractorOptions } from "./types.js";

interface CandidateEntity {
  type: EntityType;
  label: string;
  confidence: number;
  sources: EntitySource[];
  properties: Record<string, unknown>;
}

const defaultOptions: EntityExtractorOptions = {
  needScoreThreshold: 0.3,
  defaultConfidence: 0.8,
  maxSkills: 5,
  maxThemes: 3,
  maxGoals: 3,
  maxPatterns: 5,
  maxTraits: 5,
  maxLifeThemes: 3
};

const fillerPrefixes = ["Mentioned ", "Discussed ", "Has ", "Shows "];

const recognizedTypeMap: Record<string, EntityType> = {
  SKILL: "SKILL",
  CONCEPT: "CONCEPT",
  TOPIC: "CONCEPT"
};

/**
 * Turns file-analysis and needs-analysis output into a deduplicated entity set
 * anchored on exactly one primary PERSON.
 */
export class EntityExtractor {
  private readonly options: EntityExtractorOptions;

  constructor(
    options: Partial<EntityExtractorOptions> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
  }

  extract(request: ExtractionRequest): Entity[] {
    const { fileAnalysis, needsAnalysis } = request;
    const subject = this.extractPrimarySubject(fileAnalysis, needsAnalysis);
    if (!subject) {
      throw new MissingPrimarySubjectError({
        customerId: request.customerId,
        extractionId: request.extractionId
      });
    }

    const candidates: CandidateEntity[] = [
      subject,
      ...this.extractFromFileAnalysis(fileAnalysis, normalizeLabel(subject.label)),
      ...this.extractFromNeedsAnalysis(needsAnalysis)
    ];

    const createdAt = this.clock().toISOString();
    return this.deduplicate(candidates).map((candidate) => ({
      id: entityId(candidate.type, candidate.label),
      type: candidate.type,
      label: candidate.label,
      confidence: candidate.confidence,
      source: candidate.sources[0] ?? "file-analysis",
      sources: candidate.sources,
      properties: candidate.properties,
      customerId: request.customerId,
      extractionId: request.extractionId,
      createdAt
    }));
  }

  private extractPrimarySubject(
    fileAnalysis: FileAnalysis,
    needsAnalysis: NeedsAnalysis
  ): CandidateEntity | null {
    const fileName = collapseWhitespace(fileAnalysis.customerName ?? "");
    const needsName = collapseWhitespace(needsAnalysis.subjectName ?? "");
    const name = fileName || needsName;
    if (!name) {
      return null;
    }

    const normalized = normalizeLabel(name);
    const sources: EntitySource[] = [];
    const signals: number[] = [];

    if (fileName && normalizeLabel(fileName) === normalized) {
      sources.push("file-analysis");
      signals.push(this.fileConfidence(fileAnalysis));
    }
    if (needsName && normalizeLabel(needsName) === normalized) {
      sources.push("needs-analysis");
      signals.push(this.needsConfidence(needsAnalysis));
    }
    for (const recognized of fileAnalysis.entities ?? []) {
      if (recognized.type.toUpperCase() === "PERSON" && normalizeLabel(recognized.text) === normalized) {
        signals.push(clampConfidence(recognized.confidence));
      }
    }

    return {
      type: "PERSON",
      label: name,
      confidence: Math.max(...signals),
      sources,
      properties: { role: "customer", primary: true }
    };
  }

  private extractFromFileAnalysis(fileAnalysis: FileAnalysis, subjectKey: string): CandidateEntity[] {
    const confidence = this.fileConfidence(fileAnalysis);
    const insights = fileAnalysis.keyInsights ?? {};
    const candidates: CandidateEntity[] = [];

    for (const phrase of (insights.skillsAndCompetencies ?? []).slice(0, this.options.maxSkills)) {
      this.pushCleaned(candidates, "SKILL", phrase, confidence, "file-analysis", {
        category: "professional",
        phrase
      });
    }

    for (const phrase of (insights.mainThemes ?? []).slice(0, this.options.maxThemes)) {
      this.pushCleaned(candidates, "CONCEPT", phrase, confidence, "file-analysis", {
        category: "theme",
        phrase
      });
    }

    for (const phrase of (insights.goalsAndAspirations ?? []).slice(0, this.options.maxGoals)) {
      this.pushCleaned(candidates, "CONCEPT", phrase, confidence, "file-analysis", {
        category: "goal",
        phrase
      });
    }

    for (const recognized of fileAnalysis.entities ?? []) {
      const type = recognizedTypeMap[recognized.type.toUpperCase()];
      if (!type || normalizeLabel(recognized.text) === subjectKey) {
        continue;
      }
      this.pushCleaned(candidates, type, recognized.text, clampConfidence(recognized.confidence), "file-analysis", {
        category: "recognized",
        phrase: recognized.text,
        ...(recognized.context ? { context: recognized.context } : {})
      });
    }

    for (const descriptor of fileAnalysis.descriptors ?? []) {
      const type: EntityType = descriptor.category === "behavior" ? "BEHAVIORAL_PATTERN" : "PERSONALITY_TRAIT";
      this.pushCleaned(
        candidates,
        type,
        descriptor.text,
        clampConfidence(descriptor.confidence ?? confidence),
        "file-analysis",
        { category: descriptor.category, phrase: descriptor.text }
      );
    }

    return candidates;
  }

  private extractFromNeedsAnalysis(needsAnalysis: NeedsAnalysis): CandidateEntity[] {
    const confidence = this.needsConfidence(needsAnalysis);
    const candidates: CandidateEntity[] = [];

    for (const pattern of (needsAnalysis.behavioralPatterns ?? []).slice(0, this.options.maxPatterns)) {
      this.pushCleaned(candidates, "BEHAVIORAL_PATTERN", pattern, confidence, "needs-analysis", {
        category: "behavior",
        phrase: pattern
      });
    }

    for (const trait of (needsAnalysis.personalityTraits ?? []).slice(0, this.options.maxTraits)) {
      this.pushCleaned(candidates, "PERSONALITY_TRAIT", trait, confidence, "needs-analysis", {
        category: "personality",
        phrase: trait
      });
    }

    for (const theme of (needsAnalysis.lifeThemes ?? []).slice(0, this.options.maxLifeThemes)) {
      this.pushCleaned(candidates, "CONCEPT", theme, confidence, "needs-analysis", {
        category: "life_theme",
        phrase: theme
      });
    }

    const dominant = new Set((needsAnalysis.dominantNeeds ?? []).map(([name]) => normalizeLabel(name)));
    for (const [need, score] of Object.entries(needsAnalysis.needsScores ?? {})) {
      const label = collapseWhitespace(need);
      if (!label || !(score > this.options.needScoreThreshold)) {
        continue;
      }

      candidates.push({
        type: "NEED",
        label,
        confidence,
        sources: ["needs-analysis"],
        properties: {
          category: "human_need",
          score,
          dominant: dominant.has(normalizeLabel(label))
        }
      });
    }

    return candidates;
  }

  private pushCleaned(
    target: CandidateEntity[],
    type: EntityType,
    text: string,
    confidence: number,
    source: EntitySource,
    properties: Record<string, unknown>
  ): void {
    const label = cleanLabel(text);
    if (!label) {
      return;
    }

    target.push({ type, label, confidence, sources: [source], properties });
  }

  private deduplicate(candidates: CandidateEntity[]): CandidateEntity[] {
    const grouped = new Map<string, CandidateEntity>();

    for (const candidate of candidates) {
      const key = entityKey(candidate.type, candidate.label);
      const existing = grouped.get(key);
      grouped.set(key, existing ? mergeCandidates(existing, candidate) : candidate);
    }

    return [...grouped.values()];
  }

  private fileConfidence(fileAnalysis: FileAnalysis): number {
    return clampConfidence(fileAnalysis.confidence ?? this.options.defaultConfidence);
  }

  private needsConfidence(needsAnalysis: NeedsAnalysis): number {
    return clampConfidence(needsAnalysis.confidence ?? this.options.defaultConfidence);
  }
}

function mergeCandidates(a: CandidateEntity, b: CandidateEntity): CandidateEntity {
  const sources = [...a.sources];
  for (const source of b.sources) {
    if (!sources.includes(source)) {
      sources.push(source);
    }
  }

  return {
    ...a,
    confidence: Math.max(a.confidence, b.confidence),
    sources,
    properties: { ...b.properties, ...a.properties }
  };
}

function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function cleanLabel(text: string): string {
  let cleaned = collapseWhitespace(text);
  for (const prefix of fillerPrefixes) {
    if (cleaned.startsWith(prefix)) {
      cleaned = cleaned.slice(prefix.length);
      break;
    }
  }

  if (cleaned.length > 0) {
    cleaned = cleaned.charAt(0).toUpperCase() + cleaned.slice(1);
  }

  return cleaned.length > 2 ? cleaned : "";
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}
