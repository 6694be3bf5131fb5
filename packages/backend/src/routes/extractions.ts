import { Router } from "express";
import { z } from "zod";
import type {
  ExtractionRequest,
  ExtractionStore,
  FileAnalysis,
  GetExtractionResponse,
  ListExtractionsResponse,
  NeedsAnalysis,
  RunExtractionResponse
} from "@customer-graph/shared";
import { SnapshotNotFoundError } from "../errors.js";
import { asyncHandler } from "../middleware/errorHandler.js";
import { validate } from "../middleware/validator.js";
import type { ExtractionPipeline } from "../pipeline/ExtractionPipeline.js";
import { createExtractionId } from "../pipeline/identity.js";
import { getExtractionPipelineSingleton, getExtractionStoreSingleton } from "../runtime/graphRuntime.js";

const keyComponentSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/, "Invalid key component");

const fileAnalysisSchema = z.object({
  customer_name: z.string().optional(),
  content_type: z.string().optional(),
  raw_text: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  entities: z
    .array(
      z.object({
        text: z.string(),
        type: z.string(),
        confidence: z.number().min(0).max(1),
        context: z.string().optional()
      })
    )
    .optional(),
  key_insights: z
    .object({
      skills_and_competencies: z.array(z.string()).optional(),
      main_themes: z.array(z.string()).optional(),
      goals_and_aspirations: z.array(z.string()).optional()
    })
    .optional(),
  descriptors: z
    .array(
      z.object({
        text: z.string(),
        category: z.enum(["behavior", "trait"]),
        confidence: z.number().min(0).max(1).optional()
      })
    )
    .optional()
});

const needsAnalysisSchema = z.object({
  subject_name: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  needs_scores: z.record(z.number()).optional(),
  dominant_needs: z.array(z.tuple([z.string(), z.number()])).optional(),
  behavioral_patterns: z.array(z.string()).optional(),
  personality_traits: z.array(z.string()).optional(),
  life_themes: z.array(z.string()).optional(),
  evidence: z.record(z.array(z.string())).optional()
});

const runExtractionBodySchema = z.object({
  customer_id: keyComponentSchema,
  extraction_id: keyComponentSchema.optional(),
  file_analysis: fileAnalysisSchema.default({}),
  needs_analysis: needsAnalysisSchema.default({})
});

const customerParamsSchema = z.object({
  customerId: keyComponentSchema
});

const extractionParamsSchema = customerParamsSchema.extend({
  extractionId: keyComponentSchema
});

type RunExtractionBody = z.infer<typeof runExtractionBodySchema>;

export interface CreateExtractionsRouterOptions {
  pipeline?: ExtractionPipeline;
  extractionStore?: ExtractionStore;
  clock?: () => Date;
}

function toFileAnalysis(input: RunExtractionBody["file_analysis"]): FileAnalysis {
  const analysis: FileAnalysis = {
    customerName: input.customer_name,
    contentType: input.content_type,
    rawText: input.raw_text,
    confidence: input.confidence,
    entities: input.entities,
    descriptors: input.descriptors
  };
  if (input.key_insights) {
    analysis.keyInsights = {
      skillsAndCompetencies: input.key_insights.skills_and_competencies,
      mainThemes: input.key_insights.main_themes,
      goalsAndAspirations: input.key_insights.goals_and_aspirations
    };
  }
  return analysis;
}

function toNeedsAnalysis(input: RunExtractionBody["needs_analysis"]): NeedsAnalysis {
  return {
    subjectName: input.subject_name,
    confidence: input.confidence,
    needsScores: input.needs_scores,
    dominantNeeds: input.dominant_needs,
    behavioralPatterns: input.behavioral_patterns,
    personalityTraits: input.personality_traits,
    lifeThemes: input.life_themes,
    evidence: input.evidence
  };
}

export function createExtractionsRouter(options: CreateExtractionsRouterOptions = {}): Router {
  const extractionStore = options.extractionStore ?? getExtractionStoreSingleton();
  const clock = options.clock ?? (() => new Date());
  const extractionsRouter = Router();

  extractionsRouter.post(
    "/",
    validate({ body: runExtractionBodySchema }),
    asyncHandler(async (req, res) => {
      const body = runExtractionBodySchema.parse(req.body);
      const pipeline = options.pipeline ?? getExtractionPipelineSingleton();
      const request: ExtractionRequest = {
        customerId: body.customer_id,
        extractionId: body.extraction_id ?? createExtractionId(clock()),
        fileAnalysis: toFileAnalysis(body.file_analysis),
        needsAnalysis: toNeedsAnalysis(body.needs_analysis)
      };

      const { snapshot, rejectedEdgeCount } = await pipeline.run(request);
      const response: RunExtractionResponse = {
        customer_id: snapshot.customerId,
        extraction_id: snapshot.extractionId,
        node_count: snapshot.nodes.length,
        edge_count: snapshot.edges.length,
        rejected_edge_count: rejectedEdgeCount,
        quality_score: snapshot.metrics.qualityScore,
        metrics: snapshot.metrics
      };
      res.status(201).json(response);
    })
  );

  extractionsRouter.get(
    "/:customerId",
    validate({ params: customerParamsSchema }),
    asyncHandler(async (req, res) => {
      const { customerId } = customerParamsSchema.parse(req.params);
      const [refs, manifest] = await Promise.all([
        extractionStore.listSnapshots(customerId),
        extractionStore.readManifest(customerId)
      ]);

      const response: ListExtractionsResponse = {
        customer_id: customerId,
        manifest,
        extractions: refs.map((ref) => ({ extraction_id: ref.extractionId }))
      };
      res.setHeader("x-total-count", String(refs.length));
      res.json(response);
    })
  );

  extractionsRouter.get(
    "/:customerId/:extractionId",
    validate({ params: extractionParamsSchema }),
    asyncHandler(async (req, res) => {
      const { customerId, extractionId } = extractionParamsSchema.parse(req.params);
      const snapshot = await extractionStore.readSnapshot(customerId, extractionId);
      if (!snapshot) {
        throw new SnapshotNotFoundError({ customerId, extractionId });
      }

      const response: GetExtractionResponse = { snapshot };
      res.json(response);
    })
  );

  return extractionsRouter;
}
