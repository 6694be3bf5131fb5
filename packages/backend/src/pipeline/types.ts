import type { Entity, GraphSnapshot, Relationship } from "@customer-graph/shared";
import type { EvidenceMissingError } from "../errors.js";

export type PipelinePhase =
  | "extracting"
  | "relating"
  | "assembling"
  | "saving"
  | "completed"
  | "error";

export interface PipelineStatusEvent {
  customerId: string;
  extractionId: string;
  phase: PipelinePhase;
  progress: number;
  message?: string;
}

export interface EntityExtractorOptions {
  needScoreThreshold: number;
  defaultConfidence: number;
  maxSkills: number;
  maxThemes: number;
  maxGoals: number;
  maxPatterns: number;
  maxTraits: number;
  maxLifeThemes: number;
}

export interface RelationshipExtractorOptions {
  similarityThreshold: number;
  maxEvidencePerEdge: number;
}

export interface RelationshipExtractionResult {
  relationships: Relationship[];
  rejectedCount: number;
  rejections: EvidenceMissingError[];
}

export interface AssemblyInput {
  customerId: string;
  extractionId: string;
  entities: Entity[];
  relationships: RelationshipExtractionResult;
  sourceExtractionMethod?: string;
  createdAt?: Date;
}

export interface ExtractionPipelineResult {
  snapshot: GraphSnapshot;
  rejectedEdgeCount: number;
}
