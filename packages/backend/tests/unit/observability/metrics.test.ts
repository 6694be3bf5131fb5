import { Registry, type MetricValueWithName } from "prom-client";
import { describe, expect, it } from "vitest";
import { PrometheusMetricsSink, type UploadMetricEvent } from "../../../src/observability/metrics.js";

function event(overrides: Partial<UploadMetricEvent> = {}): UploadMetricEvent {
  return {
    customerId: "cust-001",
    extractionId: "1772359200000_00000001",
    outcome: "success",
    elapsedMs: 120,
    attempts: 1,
    nodesWritten: 3,
    edgesWritten: 2,
    ...overrides
  };
}

async function valuesOf(registry: Registry, name: string): Promise<MetricValueWithName<string>[]> {
  const metric = registry.getSingleMetric(name);
  if (!metric) {
    throw new Error(`metric ${name} is not registered`);
  }
  return (await metric.get()).values;
}

describe("PrometheusMetricsSink", () => {
  it("counts uploads by outcome", async () => {
    const sink = new PrometheusMetricsSink({ prefix: "test" });

    sink.recordUpload(event());
    sink.recordUpload(event({ extractionId: "1772359200000_00000002" }));
    sink.recordUpload(event({ outcome: "failure", nodesWritten: 1, edgesWritten: 0 }));

    const uploads = await valuesOf(sink.registry, "test_uploads_total");
    expect(uploads.find((value) => value.labels.outcome === "success")?.value).toBe(2);
    expect(uploads.find((value) => value.labels.outcome === "failure")?.value).toBe(1);

    expect((await valuesOf(sink.registry, "test_upload_nodes_written_total"))[0]?.value).toBe(7);
    expect((await valuesOf(sink.registry, "test_upload_edges_written_total"))[0]?.value).toBe(4);
  });

  it("observes upload duration in seconds", async () => {
    const sink = new PrometheusMetricsSink({ prefix: "test" });
    sink.recordUpload(event({ elapsedMs: 1500 }));

    const duration = await valuesOf(sink.registry, "test_upload_duration_seconds");
    const sum = duration.find((value) => value.metricName === "test_upload_duration_seconds_sum");
    expect(sum?.value).toBe(1.5);
  });

  it("ignores empty rejection batches", async () => {
    const sink = new PrometheusMetricsSink({ prefix: "test" });
    sink.recordRejectedEdges("cust-001", 0);
    sink.recordRejectedEdges("cust-001", 2);

    expect((await valuesOf(sink.registry, "test_rejected_edges_total"))[0]?.value).toBe(2);
  });

  it("registers into a supplied registry with the default prefix", async () => {
    const registry = new Registry();
    new PrometheusMetricsSink({ registry });

    const text = await registry.metrics();
    expect(text).toContain("# TYPE customer_graph_uploads_total counter");
    expect(text).toContain("# TYPE customer_graph_upload_duration_seconds histogram");
  });
});
