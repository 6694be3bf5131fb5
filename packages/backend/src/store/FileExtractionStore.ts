import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type {
  CustomerManifest,
  ExtractionStore,
  GraphSnapshot,
  ManifestEntry,
  SnapshotRef
} from "@customer-graph/shared";
import { InvalidKeyComponentError, InvalidSnapshotError, SnapshotExistsError } from "../errors.js";
import { isSafeKeyComponent } from "../pipeline/identity.js";
import { KeyedSerialQueue } from "../utils/async.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { decodeManifest, decodeSnapshot, encodeSnapshot } from "./snapshotCodec.js";

const ROOT_PREFIX = "customer-graphs";
const TEMP_PREFIX = ".tmp-";

/**
 * Extraction store on the local filesystem:
 *
 *   {root}/customer-graphs/{customerId}/extractions/{extractionId}/{nodes,edges,metadata}.json
 *   {root}/customer-graphs/{customerId}/manifest.json
 *
 * A snapshot is staged in a temp directory and renamed into place, so readers
 * see all three documents or none.
 */
export class FileExtractionStore implements ExtractionStore {
  private readonly rootDir: string;
  private readonly manifestQueue = new KeyedSerialQueue();
  private readonly logger: Logger;

  constructor(rootDir: string, logger?: Logger) {
    this.rootDir = resolve(rootDir);
    this.logger = logger ?? defaultLogger;
  }

  async writeSnapshot(snapshot: GraphSnapshot): Promise<void> {
    const { customerId, extractionId } = snapshot;
    const finalDir = this.extractionDir(customerId, extractionId);
    if (await pathExists(finalDir)) {
      throw new SnapshotExistsError({ customerId, extractionId });
    }

    const extractionsDir = this.extractionsDir(customerId);
    await mkdir(extractionsDir, { recursive: true });

    const stagingDir = join(extractionsDir, `${TEMP_PREFIX}${randomUUID()}`);
    const documents = encodeSnapshot(snapshot);
    try {
      await mkdir(stagingDir);
      await writeFile(join(stagingDir, "nodes.json"), JSON.stringify(documents.nodes, null, 2), "utf8");
      await writeFile(join(stagingDir, "edges.json"), JSON.stringify(documents.edges, null, 2), "utf8");
      await writeFile(join(stagingDir, "metadata.json"), JSON.stringify(documents.metadata, null, 2), "utf8");
      await rename(stagingDir, finalDir);
    } catch (error) {
      await rm(stagingDir, { recursive: true, force: true });
      // A concurrent writer committed the same key first.
      if (isErrnoCode(error, "ENOTEMPTY") || isErrnoCode(error, "EEXIST")) {
        throw new SnapshotExistsError({ customerId, extractionId });
      }
      throw error;
    }

    await this.manifestQueue.run(customerId, () =>
      this.appendManifestEntry(customerId, {
        extractionId,
        prefix: `${ROOT_PREFIX}/${customerId}/extractions/${extractionId}/`,
        nodeCount: snapshot.nodes.length,
        edgeCount: snapshot.edges.length,
        createdAt: snapshot.metadata.createdAt
      })
    );

    this.logger.debug({ customerId, extractionId, dir: finalDir }, "Snapshot written");
  }

  async readSnapshot(customerId: string, extractionId: string): Promise<GraphSnapshot | null> {
    const dir = this.extractionDir(customerId, extractionId);
    if (!(await pathExists(dir))) {
      return null;
    }

    let snapshot: GraphSnapshot;
    try {
      const [nodes, edges, metadata] = await Promise.all([
        readJson(join(dir, "nodes.json")),
        readJson(join(dir, "edges.json")),
        readJson(join(dir, "metadata.json"))
      ]);
      snapshot = decodeSnapshot({ nodes, edges, metadata });
    } catch (error) {
      throw new InvalidSnapshotError("stored documents failed validation", { customerId, extractionId }, {
        cause: error
      });
    }

    if (snapshot.customerId !== customerId || snapshot.extractionId !== extractionId) {
      throw new InvalidSnapshotError("metadata does not match its storage key", { customerId, extractionId });
    }
    return snapshot;
  }

  async listSnapshots(customerId: string): Promise<SnapshotRef[]> {
    const names = await listDirectories(this.extractionsDir(customerId));
    return names
      .filter((name) => !name.startsWith(TEMP_PREFIX) && isSafeKeyComponent(name))
      .sort()
      .map((extractionId) => ({ customerId, extractionId }));
  }

  async listCustomers(): Promise<string[]> {
    const names = await listDirectories(join(this.rootDir, ROOT_PREFIX));
    return names.filter((name) => isSafeKeyComponent(name)).sort();
  }

  async readManifest(customerId: string): Promise<CustomerManifest | null> {
    const path = this.manifestPath(customerId);
    if (!(await pathExists(path))) {
      return null;
    }
    try {
      return decodeManifest(await readJson(path));
    } catch (error) {
      throw new InvalidSnapshotError("manifest failed validation", { customerId }, { cause: error });
    }
  }

  private async appendManifestEntry(customerId: string, entry: ManifestEntry): Promise<void> {
    const now = new Date().toISOString();
    const manifest: CustomerManifest = (await this.readManifest(customerId)) ?? {
      customerId,
      createdAt: now,
      lastUpdated: now,
      extractions: []
    };

    const extractions = manifest.extractions.filter((item) => item.extractionId !== entry.extractionId);
    extractions.push(entry);
    extractions.sort((a, b) => a.extractionId.localeCompare(b.extractionId));

    const path = this.manifestPath(customerId);
    const tempPath = join(this.customerDir(customerId), `${TEMP_PREFIX}${randomUUID()}.json`);
    await writeFile(tempPath, JSON.stringify({ ...manifest, lastUpdated: now, extractions }, null, 2), "utf8");
    try {
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }

  private customerDir(customerId: string): string {
    assertKeyComponent("customerId", customerId);
    return join(this.rootDir, ROOT_PREFIX, customerId);
  }

  private extractionsDir(customerId: string): string {
    return join(this.customerDir(customerId), "extractions");
  }

  private extractionDir(customerId: string, extractionId: string): string {
    assertKeyComponent("extractionId", extractionId);
    return join(this.extractionsDir(customerId), extractionId);
  }

  private manifestPath(customerId: string): string {
    return join(this.customerDir(customerId), "manifest.json");
  }
}

function assertKeyComponent(field: string, value: string): void {
  if (!isSafeKeyComponent(value)) {
    throw new InvalidKeyComponentError(field, value);
  }
}

async function readJson(path: string): Promise<unknown> {
  const raw = await readFile(path, "utf8");
  return JSON.parse(raw);
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
