import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export type UploadOutcome = "success" | "failure";

/** One event per extraction processed by the bulk upload coordinator. */
export interface UploadMetricEvent {
  customerId: string;
  extractionId: string;
  outcome: UploadOutcome;
  elapsedMs: number;
  attempts: number;
  nodesWritten: number;
  edgesWritten: number;
}

export interface MetricsSink {
  recordUpload(event: UploadMetricEvent): void;
  recordRejectedEdges(customerId: string, count: number): void;
}

export class NoopMetricsSink implements MetricsSink {
  recordUpload(): void {}

  recordRejectedEdges(): void {}
}

export interface PrometheusMetricsOptions {
  prefix?: string;
  registry?: Registry;
  collectDefaults?: boolean;
}

export class PrometheusMetricsSink implements MetricsSink {
  readonly registry: Registry;
  private readonly uploadsTotal: Counter<"outcome">;
  private readonly uploadDuration: Histogram<"outcome">;
  private readonly nodesWrittenTotal: Counter;
  private readonly edgesWrittenTotal: Counter;
  private readonly rejectedEdgesTotal: Counter;

  constructor(options: PrometheusMetricsOptions = {}) {
    const prefix = options.prefix ?? "customer_graph";
    this.registry = options.registry ?? new Registry();
    this.registry.setDefaultLabels({ service: "customer-graph-backend" });

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry, prefix: `${prefix}_` });
    }

    this.uploadsTotal = new Counter({
      name: `${prefix}_uploads_total`,
      help: "Extractions processed by the bulk upload coordinator",
      labelNames: ["outcome"] as const,
      registers: [this.registry]
    });

    this.uploadDuration = new Histogram({
      name: `${prefix}_upload_duration_seconds`,
      help: "Time spent uploading one extraction",
      labelNames: ["outcome"] as const,
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
      registers: [this.registry]
    });

    this.nodesWrittenTotal = new Counter({
      name: `${prefix}_upload_nodes_written_total`,
      help: "Vertices upserted into the graph database",
      registers: [this.registry]
    });

    this.edgesWrittenTotal = new Counter({
      name: `${prefix}_upload_edges_written_total`,
      help: "Edges upserted into the graph database",
      registers: [this.registry]
    });

    this.rejectedEdgesTotal = new Counter({
      name: `${prefix}_rejected_edges_total`,
      help: "Relationships dropped for missing evidence",
      registers: [this.registry]
    });
  }

  recordUpload(event: UploadMetricEvent): void {
    this.uploadsTotal.inc({ outcome: event.outcome });
    this.uploadDuration.observe({ outcome: event.outcome }, event.elapsedMs / 1000);
    this.nodesWrittenTotal.inc(event.nodesWritten);
    this.edgesWrittenTotal.inc(event.edgesWritten);
  }

  recordRejectedEdges(_customerId: string, count: number): void {
    if (count > 0) {
      this.rejectedEdgesTotal.inc(count);
    }
  }
}
