import { EventEmitter } from "node:events";
import type { ExtractionRequest, ExtractionStore } from "@customer-graph/shared";
import { isCustomerGraphError } from "../errors.js";
import { NoopMetricsSink, type MetricsSink } from "../observability/metrics.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { EntityExtractor } from "./EntityExtractor.js";
import { GraphAssembler } from "./GraphAssembler.js";
import { RelationshipExtractor } from "./RelationshipExtractor.js";
import type { ExtractionPipelineResult, PipelinePhase, PipelineStatusEvent } from "./types.js";

export interface ExtractionPipelineDeps {
  entityExtractor: EntityExtractor;
  relationshipExtractor: RelationshipExtractor;
  assembler?: GraphAssembler;
  metrics?: MetricsSink;
  eventEmitter?: EventEmitter;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Runs one extraction end to end: entities, relationships, assembly, then a
 * single atomic store write. Any fatal error surfaces before the write.
 */
export class ExtractionPipeline {
  private readonly entityExtractor: EntityExtractor;
  private readonly relationshipExtractor: RelationshipExtractor;
  private readonly assembler: GraphAssembler;
  private readonly metrics: MetricsSink;
  private readonly eventEmitter: EventEmitter;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly store: ExtractionStore,
    deps: ExtractionPipelineDeps
  ) {
    this.entityExtractor = deps.entityExtractor;
    this.relationshipExtractor = deps.relationshipExtractor;
    this.logger = deps.logger ?? defaultLogger;
    this.assembler = deps.assembler ?? new GraphAssembler(this.logger);
    this.metrics = deps.metrics ?? new NoopMetricsSink();
    this.eventEmitter = deps.eventEmitter ?? new EventEmitter();
    this.clock = deps.clock ?? (() => new Date());
  }

  onStatus(listener: (event: PipelineStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  async run(request: ExtractionRequest): Promise<ExtractionPipelineResult> {
    const { customerId, extractionId } = request;

    try {
      this.emitStatus(request, "extracting", 0);
      const entities = this.entityExtractor.extract(request);

      this.emitStatus(request, "relating", 30);
      const relationships = await this.relationshipExtractor.extract(entities, request);

      this.emitStatus(request, "assembling", 70);
      const snapshot = this.assembler.assemble({
        customerId,
        extractionId,
        entities,
        relationships,
        createdAt: this.clock()
      });

      this.emitStatus(request, "saving", 90);
      await this.store.writeSnapshot(snapshot);
      this.metrics.recordRejectedEdges(customerId, snapshot.metadata.rejectedEdgeCount);

      this.logger.info(
        {
          customerId,
          extractionId,
          nodes: snapshot.nodes.length,
          edges: snapshot.edges.length,
          rejectedEdges: snapshot.metadata.rejectedEdgeCount,
          qualityScore: snapshot.metrics.qualityScore
        },
        "Extraction snapshot stored"
      );

      this.emitStatus(request, "completed", 100);
      return { snapshot, rejectedEdgeCount: snapshot.metadata.rejectedEdgeCount };
    } catch (error) {
      this.logger.error(
        {
          customerId,
          extractionId,
          code: isCustomerGraphError(error) ? error.code : undefined,
          err: error
        },
        "Extraction failed"
      );
      this.emitStatus(request, "error", 100, error instanceof Error ? error.message : "Unknown error");
      throw error;
    }
  }

  private emitStatus(
    request: ExtractionRequest,
    phase: PipelinePhase,
    progress: number,
    message?: string
  ): void {
    const payload: PipelineStatusEvent = {
      customerId: request.customerId,
      extractionId: request.extractionId,
      phase,
      progress
    };
    if (message !== undefined) {
      payload.message = message;
    }

    this.eventEmitter.emit("status", payload);
  }
}
