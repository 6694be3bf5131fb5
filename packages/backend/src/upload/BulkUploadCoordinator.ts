import type {
  BulkUploadRequest,
  BulkUploadResult,
  ExtractionStore,
  ExtractionUploadOutcome,
  GraphDatabase,
  GraphSnapshot,
  SnapshotRef,
  UploadRecord,
  WriteState
} from "@customer-graph/shared";
import {
  CrossCustomerViolationError,
  InvalidKeyComponentError,
  InvalidSnapshotError,
  PartialUploadFailureError,
  SnapshotNotFoundError,
  UploadTimeoutError,
  describeError,
  isCustomerGraphError
} from "../errors.js";
import { NoopMetricsSink, type MetricsSink } from "../observability/metrics.js";
import { isSafeKeyComponent } from "../pipeline/identity.js";
import type { UploadRecordStoreLike } from "../services/UploadRecordStore.js";
import { validateSnapshot } from "../store/snapshotCodec.js";
import { KeyedSerialQueue, runWithConcurrency, sleep as defaultSleep, withTimeout } from "../utils/async.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { toEdgeProperties, toVertexProperties } from "./graphRecords.js";
import { createPendingRecord, isTerminal, transition, type TransitionResult } from "./uploadState.js";

export interface BulkUploadCoordinatorOptions {
  /** Upload attempts per extraction before its record is exhausted. */
  maxAttempts: number;
  /** Base delay for in-run retries; doubles per attempt. */
  retryDelayMs: number;
  /** Timeout for each store read and each graph upsert. */
  callTimeoutMs: number;
  /** Extra tries for a call that timed out. */
  callRetries: number;
  /** Customers uploaded in parallel by `uploadCustomers`. */
  customerConcurrency: number;
}

export interface BulkUploadCoordinatorDeps {
  extractionStore: ExtractionStore;
  graphDatabase: GraphDatabase;
  recordStore: UploadRecordStoreLike;
  metrics?: MetricsSink;
  logger?: Logger;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface UploadRunOptions {
  signal?: AbortSignal;
}

export interface CustomerUploadFailure {
  customerId: string;
  error: Error;
}

export interface MultiCustomerUploadResult {
  results: BulkUploadResult[];
  failures: CustomerUploadFailure[];
}

const defaultOptions: BulkUploadCoordinatorOptions = {
  maxAttempts: 5,
  retryDelayMs: 1000,
  callTimeoutMs: 30_000,
  callRetries: 2,
  customerConcurrency: 4
};

interface WriteProgress {
  nodesWritten: number;
  edgesWritten: number;
}

/**
 * Moves stored snapshots into the graph database. Each extraction has an
 * Upload Record driven through PENDING -> IN_PROGRESS -> SUCCEEDED | FAILED;
 * uploads for one customer run one at a time, different customers in parallel.
 */
export class BulkUploadCoordinator {
  private readonly options: BulkUploadCoordinatorOptions;
  private readonly extractionStore: ExtractionStore;
  private readonly graphDatabase: GraphDatabase;
  private readonly recordStore: UploadRecordStoreLike;
  private readonly metrics: MetricsSink;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly customerQueue = new KeyedSerialQueue();

  constructor(deps: BulkUploadCoordinatorDeps, options: Partial<BulkUploadCoordinatorOptions> = {}) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.extractionStore = deps.extractionStore;
    this.graphDatabase = deps.graphDatabase;
    this.recordStore = deps.recordStore;
    this.metrics = deps.metrics ?? new NoopMetricsSink();
    this.logger = deps.logger ?? defaultLogger;
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  upload(request: BulkUploadRequest, runOptions: UploadRunOptions = {}): Promise<BulkUploadResult> {
    if (!isSafeKeyComponent(request.customerId)) {
      return Promise.reject(new InvalidKeyComponentError("customerId", request.customerId));
    }
    return this.customerQueue.run(request.customerId, () => this.runUpload(request, runOptions));
  }

  async uploadCustomers(
    customerIds: string[],
    dryRun: boolean,
    runOptions: UploadRunOptions = {}
  ): Promise<MultiCustomerUploadResult> {
    const unique = [...new Set(customerIds)];
    const results: BulkUploadResult[] = [];
    const failures: CustomerUploadFailure[] = [];

    await runWithConcurrency(unique, this.options.customerConcurrency, async (customerId) => {
      try {
        results.push(await this.upload({ customerId, dryRun }, runOptions));
      } catch (error) {
        this.logger.error({ customerId, err: error }, "Customer upload aborted");
        failures.push({ customerId, error: error instanceof Error ? error : new Error(describeError(error)) });
      }
    });

    results.sort((a, b) => a.customerId.localeCompare(b.customerId));
    return { results, failures };
  }

  listRecords(customerId: string): UploadRecord[] {
    const records = this.recordStore.listByCustomer(customerId);
    for (const record of records) {
      this.assertSameCustomer(customerId, record);
    }
    return records;
  }

  private async runUpload(request: BulkUploadRequest, runOptions: UploadRunOptions): Promise<BulkUploadResult> {
    const { customerId, dryRun } = request;
    const startedAt = Date.now();
    const eligible = await this.discover(customerId, dryRun);

    this.logger.info({ customerId, dryRun, eligible: eligible.length }, "Bulk upload started");

    const outcomes: ExtractionUploadOutcome[] = [];
    let cancelled = false;

    for (const ref of eligible) {
      if (runOptions.signal?.aborted) {
        cancelled = true;
        break;
      }

      const outcome = dryRun
        ? await this.validateExtraction(ref)
        : await this.uploadExtraction(ref, runOptions.signal);
      outcomes.push(outcome);
    }

    const succeeded = outcomes.filter((outcome) => outcome.status === "SUCCEEDED").length;
    const failed = outcomes.filter((outcome) => outcome.status === "FAILED" || outcome.status === "INVALID").length;
    const result: BulkUploadResult = {
      customerId,
      dryRun,
      processed: outcomes.length,
      succeeded,
      failed,
      cancelled,
      durationSeconds: Math.round(Date.now() - startedAt) / 1000,
      outcomes
    };

    this.logger.info(
      { customerId, dryRun, processed: result.processed, succeeded, failed, cancelled },
      "Bulk upload finished"
    );
    return result;
  }

  /**
   * Snapshots with no SUCCEEDED record and retries left, in extraction id
   * order. Records stranded IN_PROGRESS by an earlier crash are failed first.
   */
  private async discover(customerId: string, dryRun: boolean): Promise<SnapshotRef[]> {
    const refs = await this.callWithTimeout("listSnapshots", { customerId }, () =>
      this.extractionStore.listSnapshots(customerId)
    );

    const records = new Map<string, UploadRecord>();
    for (const record of this.recordStore.listByCustomer(customerId)) {
      this.assertSameCustomer(customerId, record);
      records.set(record.extractionId, record);
    }

    const eligible: SnapshotRef[] = [];
    for (const ref of refs) {
      if (ref.customerId !== customerId) {
        throw new CrossCustomerViolationError(customerId, ref.customerId, { extractionId: ref.extractionId });
      }

      let record = records.get(ref.extractionId);
      if (record && record.state.status === "IN_PROGRESS" && !dryRun) {
        record = this.save(
          transition(
            record,
            {
              status: "FAILED",
              failedAt: this.clock(),
              retryable: true,
              exhausted: record.attemptCount >= this.options.maxAttempts
            },
            { lastError: "Upload interrupted before completion" },
            this.clock()
          )
        );
      }

      if (!record || !isTerminal(record.state)) {
        eligible.push(ref);
      }
    }

    return eligible.sort((a, b) => a.extractionId.localeCompare(b.extractionId));
  }

  private async validateExtraction(ref: SnapshotRef): Promise<ExtractionUploadOutcome> {
    const base = { extractionId: ref.extractionId, attempts: 0, nodesWritten: 0, edgesWritten: 0 };
    try {
      await this.readSnapshot(ref);
      return { ...base, status: "VALIDATED" };
    } catch (error) {
      if (error instanceof CrossCustomerViolationError) {
        throw error;
      }
      return { ...base, status: "INVALID", error: describeError(error) };
    }
  }

  private async uploadExtraction(ref: SnapshotRef, signal?: AbortSignal): Promise<ExtractionUploadOutcome> {
    const { customerId, extractionId } = ref;
    const startedAt = Date.now();
    let record = this.loadOrCreateRecord(customerId, extractionId);
    let lastFailure: unknown = null;
    let progress: WriteProgress = { nodesWritten: 0, edgesWritten: 0 };

    while (true) {
      if (record.state.status === "FAILED") {
        record = this.save(transition(record, { status: "PENDING" }, {}, this.clock()));
      }

      const attempt = record.attemptCount + 1;
      record = this.save(
        transition(
          record,
          { status: "IN_PROGRESS", startedAt: this.clock() },
          { attemptCount: attempt, nodesWritten: 0, edgesWritten: 0 },
          this.clock()
        )
      );

      progress = { nodesWritten: 0, edgesWritten: 0 };
      try {
        const snapshot = await this.readSnapshot(ref);
        await this.writeSnapshot(snapshot, progress);

        record = this.save(
          transition(
            record,
            { status: "SUCCEEDED", completedAt: this.clock() },
            { lastError: null, nodesWritten: progress.nodesWritten, edgesWritten: progress.edgesWritten },
            this.clock()
          )
        );
        this.recordMetric(record, "success", startedAt);
        this.logger.info(
          { customerId, extractionId, attempt, nodes: progress.nodesWritten, edges: progress.edgesWritten },
          "Extraction uploaded"
        );
        return {
          extractionId,
          status: "SUCCEEDED",
          attempts: record.attemptCount,
          nodesWritten: progress.nodesWritten,
          edgesWritten: progress.edgesWritten
        };
      } catch (error) {
        lastFailure = error;
        const retryable = isCustomerGraphError(error) ? error.retryable : true;
        const exhausted = record.attemptCount >= this.options.maxAttempts;

        record = this.save(
          transition(
            record,
            { status: "FAILED", failedAt: this.clock(), retryable, exhausted },
            {
              lastError: describeError(error),
              nodesWritten: progress.nodesWritten,
              edgesWritten: progress.edgesWritten
            },
            this.clock()
          )
        );

        this.logger.warn(
          { customerId, extractionId, attempt, retryable, exhausted, err: error },
          "Extraction upload attempt failed"
        );

        if (error instanceof CrossCustomerViolationError) {
          throw error;
        }
        if (!retryable || exhausted || signal?.aborted) {
          break;
        }

        await this.sleep(this.options.retryDelayMs * 2 ** (attempt - 1));
      }
    }

    this.recordMetric(record, "failure", startedAt);
    return {
      extractionId,
      status: "FAILED",
      attempts: record.attemptCount,
      nodesWritten: progress.nodesWritten,
      edgesWritten: progress.edgesWritten,
      writeState: writeStateOf(lastFailure, progress),
      error: describeError(lastFailure)
    };
  }

  private async readSnapshot(ref: SnapshotRef): Promise<GraphSnapshot> {
    const context = { customerId: ref.customerId, extractionId: ref.extractionId };
    const snapshot = await this.callWithTimeout("readSnapshot", context, () =>
      this.extractionStore.readSnapshot(ref.customerId, ref.extractionId)
    );
    if (!snapshot) {
      throw new SnapshotNotFoundError(context);
    }
    if (snapshot.customerId !== ref.customerId) {
      throw new CrossCustomerViolationError(ref.customerId, snapshot.customerId, context);
    }

    const problems = validateSnapshot(snapshot);
    if (problems.length > 0) {
      throw new InvalidSnapshotError(problems.join("; "), context);
    }
    return snapshot;
  }

  /** Vertices first, then edges; `progress` is updated after every upsert. */
  private async writeSnapshot(snapshot: GraphSnapshot, progress: WriteProgress): Promise<void> {
    const context = { customerId: snapshot.customerId, extractionId: snapshot.extractionId };
    try {
      for (const node of snapshot.nodes) {
        await this.callWithTimeout("upsertVertex", { ...context, vertexId: node.id }, () =>
          this.graphDatabase.upsertVertex(node.id, node.type, toVertexProperties(node))
        );
        progress.nodesWritten += 1;
      }

      for (const edge of snapshot.edges) {
        await this.callWithTimeout("upsertEdge", { ...context, edgeId: edge.id }, () =>
          this.graphDatabase.upsertEdge(edge.id, edge.sourceId, edge.targetId, edge.type, toEdgeProperties(edge))
        );
        progress.edgesWritten += 1;
      }
    } catch (error) {
      if (progress.nodesWritten > 0 || progress.edgesWritten > 0) {
        throw new PartialUploadFailureError({ ...progress }, context, error);
      }
      throw error;
    }
  }

  private async callWithTimeout<T>(
    operation: string,
    context: Record<string, string>,
    call: () => Promise<T>
  ): Promise<T> {
    const timeoutMs = this.options.callTimeoutMs;
    const totalTries = this.options.callRetries + 1;

    for (let tryIndex = 1; tryIndex <= totalTries; tryIndex += 1) {
      try {
        return await withTimeout(call(), timeoutMs, () => new UploadTimeoutError(operation, timeoutMs, context));
      } catch (error) {
        if (!(error instanceof UploadTimeoutError) || tryIndex === totalTries) {
          throw error;
        }
        this.logger.debug({ ...context, operation, tryIndex }, "Graph call timed out, retrying");
      }
    }

    throw new UploadTimeoutError(operation, timeoutMs, context);
  }

  private loadOrCreateRecord(customerId: string, extractionId: string): UploadRecord {
    const existing = this.recordStore.get(customerId, extractionId);
    if (existing) {
      this.assertSameCustomer(customerId, existing);
      return existing;
    }
    return this.save(createPendingRecord(customerId, extractionId, this.clock()));
  }

  private save(result: TransitionResult): UploadRecord {
    this.recordStore.save(result.record, result.event);
    return result.record;
  }

  private assertSameCustomer(customerId: string, record: UploadRecord): void {
    if (record.customerId !== customerId) {
      throw new CrossCustomerViolationError(customerId, record.customerId, {
        extractionId: record.extractionId
      });
    }
  }

  private recordMetric(record: UploadRecord, outcome: "success" | "failure", startedAt: number): void {
    this.metrics.recordUpload({
      customerId: record.customerId,
      extractionId: record.extractionId,
      outcome,
      elapsedMs: Date.now() - startedAt,
      attempts: record.attemptCount,
      nodesWritten: record.nodesWritten,
      edgesWritten: record.edgesWritten
    });
  }
}

function writeStateOf(error: unknown, progress: WriteProgress): WriteState {
  if (isCustomerGraphError(error)) {
    return error.writeState;
  }
  return progress.nodesWritten > 0 || progress.edgesWritten > 0 ? "partially_written" : "nothing_written";
}
