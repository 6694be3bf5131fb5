import type {
  GraphDatabase,
  GraphProperties,
  GraphRecord,
  GraphRecordKind
} from "@customer-graph/shared";

export interface UpsertCall {
  kind: GraphRecordKind;
  id: string;
  customerId: string;
  extractionId: string;
}

interface InjectedFailure {
  kind: GraphRecordKind;
  remaining: number;
  error?: Error;
  hang: boolean;
}

/**
 * In-memory graph keyed by (customerId, id). `beforeUpsert` and
 * `injectFailure` let tests fail or stall individual calls.
 */
export class FakeGraphDatabase implements GraphDatabase {
  readonly calls: UpsertCall[] = [];
  connected = false;
  healthy = true;
  connectError: Error | null = null;
  beforeUpsert: ((call: UpsertCall) => void) | null = null;

  private readonly vertices = new Map<string, GraphRecord>();
  private readonly edges = new Map<string, GraphRecord>();
  private readonly failures: InjectedFailure[] = [];

  async connect(): Promise<void> {
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async healthCheck(): Promise<boolean> {
    return this.connected && this.healthy;
  }

  injectFailure(kind: GraphRecordKind, options: { times?: number; error?: Error; hang?: boolean } = {}): void {
    const failure: InjectedFailure = {
      kind,
      remaining: options.times ?? 1,
      hang: options.hang ?? false
    };
    if (options.error) {
      failure.error = options.error;
    }
    this.failures.push(failure);
  }

  async upsertVertex(id: string, type: string, properties: GraphProperties): Promise<void> {
    await this.intercept({ kind: "vertex", id, customerId: properties.customerId, extractionId: properties.extractionId });

    const key = graphKey(properties.customerId, id);
    const existing = this.vertices.get(key);
    if (existing && isNewer(existing, properties)) {
      return;
    }
    this.vertices.set(key, {
      kind: "vertex",
      id,
      type,
      properties: { ...existing?.properties, ...properties }
    });
  }

  async upsertEdge(
    id: string,
    from: string,
    to: string,
    type: string,
    properties: GraphProperties
  ): Promise<void> {
    await this.intercept({ kind: "edge", id, customerId: properties.customerId, extractionId: properties.extractionId });

    const { customerId } = properties;
    if (!this.vertices.has(graphKey(customerId, from)) || !this.vertices.has(graphKey(customerId, to))) {
      throw new Error(`Cannot upsert edge ${id}: endpoint ${from} or ${to} does not exist`);
    }

    const key = graphKey(customerId, id);
    const existing = this.edges.get(key);
    if (existing && isNewer(existing, properties)) {
      return;
    }
    this.edges.set(key, {
      kind: "edge",
      id,
      type,
      from,
      to,
      properties: { ...existing?.properties, ...properties }
    });
  }

  async queryByCustomer(customerId: string, kind: GraphRecordKind): Promise<GraphRecord[]> {
    const source = kind === "vertex" ? this.vertices : this.edges;
    return [...source.values()]
      .filter((record) => record.properties.customerId === customerId)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((record) => ({ ...record, properties: { ...record.properties } }));
  }

  countVertices(customerId?: string): number {
    return countFor(this.vertices, customerId);
  }

  countEdges(customerId?: string): number {
    return countFor(this.edges, customerId);
  }

  private async intercept(call: UpsertCall): Promise<void> {
    this.calls.push(call);
    this.beforeUpsert?.(call);

    const failure = this.failures.find((item) => item.kind === call.kind && item.remaining > 0);
    if (!failure) {
      return;
    }
    failure.remaining -= 1;
    if (failure.hang) {
      await new Promise<never>(() => {});
    }
    throw failure.error ?? new Error(`Injected ${call.kind} failure for ${call.id}`);
  }
}

function graphKey(customerId: string, id: string): string {
  return `${customerId}:${id}`;
}

function countFor(records: Map<string, GraphRecord>, customerId?: string): number {
  if (customerId === undefined) {
    return records.size;
  }
  return [...records.values()].filter((record) => record.properties.customerId === customerId).length;
}

function isNewer(existing: GraphRecord, incoming: GraphProperties): boolean {
  return existing.properties.extractionId > incoming.extractionId;
}
