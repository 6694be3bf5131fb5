import type {
  CustomerManifest,
  ExtractionStore,
  GraphSnapshot,
  SnapshotRef
} from "@customer-graph/shared";
import { SnapshotExistsError } from "../../src/errors.js";

export class InMemoryExtractionStore implements ExtractionStore {
  readonly writes: SnapshotRef[] = [];
  /** Extra refs returned by `listSnapshots`, regardless of customer. */
  readonly strayRefs: SnapshotRef[] = [];

  private readonly snapshots = new Map<string, Map<string, GraphSnapshot>>();
  private readonly manifests = new Map<string, CustomerManifest>();

  async writeSnapshot(snapshot: GraphSnapshot): Promise<void> {
    const byExtraction = this.customerSnapshots(snapshot.customerId);
    if (byExtraction.has(snapshot.extractionId)) {
      throw new SnapshotExistsError({ customerId: snapshot.customerId, extractionId: snapshot.extractionId });
    }
    this.seed(snapshot);
    this.writes.push({ customerId: snapshot.customerId, extractionId: snapshot.extractionId });
  }

  /** Stores a snapshot without checks, e.g. a deliberately broken one. */
  seed(snapshot: GraphSnapshot): void {
    this.customerSnapshots(snapshot.customerId).set(snapshot.extractionId, snapshot);

    const now = snapshot.metadata.createdAt;
    const manifest = this.manifests.get(snapshot.customerId) ?? {
      customerId: snapshot.customerId,
      createdAt: now,
      lastUpdated: now,
      extractions: []
    };
    manifest.extractions = [
      ...manifest.extractions.filter((entry) => entry.extractionId !== snapshot.extractionId),
      {
        extractionId: snapshot.extractionId,
        prefix: `customer-graphs/${snapshot.customerId}/extractions/${snapshot.extractionId}/`,
        nodeCount: snapshot.nodes.length,
        edgeCount: snapshot.edges.length,
        createdAt: now
      }
    ].sort((a, b) => a.extractionId.localeCompare(b.extractionId));
    manifest.lastUpdated = now;
    this.manifests.set(snapshot.customerId, manifest);
  }

  async readSnapshot(customerId: string, extractionId: string): Promise<GraphSnapshot | null> {
    return this.snapshots.get(customerId)?.get(extractionId) ?? null;
  }

  async listSnapshots(customerId: string): Promise<SnapshotRef[]> {
    const own = [...(this.snapshots.get(customerId)?.keys() ?? [])]
      .sort()
      .map((extractionId) => ({ customerId, extractionId }));
    return [...own, ...this.strayRefs];
  }

  async listCustomers(): Promise<string[]> {
    return [...this.snapshots.keys()].sort();
  }

  async readManifest(customerId: string): Promise<CustomerManifest | null> {
    return this.manifests.get(customerId) ?? null;
  }

  private customerSnapshots(customerId: string): Map<string, GraphSnapshot> {
    let byExtraction = this.snapshots.get(customerId);
    if (!byExtraction) {
      byExtraction = new Map();
      this.snapshots.set(customerId, byExtraction);
    }
    return byExtraction;
  }
}
