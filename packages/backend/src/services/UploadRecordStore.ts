import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type { UploadRecord, UploadRecordEvent, UploadState, UploadStatus } from "@customer-graph/shared";

export interface UploadRecordStoreOptions {
  dbPath?: string;
}

/**
 * Durable ledger of upload progress. `save` writes the record and appends its
 * transition event in one transaction; events are never updated or deleted.
 */
export interface UploadRecordStoreLike {
  close(): void;
  get(customerId: string, extractionId: string): UploadRecord | null;
  listByCustomer(customerId: string): UploadRecord[];
  save(record: UploadRecord, event: UploadRecordEvent): void;
  listEvents(customerId: string, extractionId?: string): UploadRecordEvent[];
}

interface UploadRecordRow {
  customer_id: string;
  extraction_id: string;
  status: UploadStatus;
  state_at: string | null;
  retryable: number;
  exhausted: number;
  attempt_count: number;
  last_error: string | null;
  nodes_written: number;
  edges_written: number;
  created_at: string;
  updated_at: string;
}

interface UploadRecordEventRow {
  customer_id: string;
  extraction_id: string;
  from_status: UploadStatus | null;
  to_status: UploadStatus;
  attempt_count: number;
  error: string | null;
  occurred_at: string;
}

const RECORD_COLUMNS = `
  customer_id, extraction_id, status, state_at, retryable, exhausted, attempt_count,
  last_error, nodes_written, edges_written, created_at, updated_at
`;

export class SqliteUploadRecordStore implements UploadRecordStoreLike {
  private readonly db: Database.Database;

  constructor(options: UploadRecordStoreOptions = {}) {
    const dbPath = options.dbPath === ":memory:" ? ":memory:" : resolve(options.dbPath ?? "data/uploads.db");
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  get(customerId: string, extractionId: string): UploadRecord | null {
    const row = this.db
      .prepare<[string, string], UploadRecordRow>(
        `
        SELECT ${RECORD_COLUMNS}
        FROM upload_records
        WHERE customer_id = ? AND extraction_id = ?
        LIMIT 1
        `
      )
      .get(customerId, extractionId);

    return row ? this.mapRecordRow(row) : null;
  }

  listByCustomer(customerId: string): UploadRecord[] {
    const rows = this.db
      .prepare<[string], UploadRecordRow>(
        `
        SELECT ${RECORD_COLUMNS}
        FROM upload_records
        WHERE customer_id = ?
        ORDER BY extraction_id ASC
        `
      )
      .all(customerId);

    return rows.map((row) => this.mapRecordRow(row));
  }

  save(record: UploadRecord, event: UploadRecordEvent): void {
    const upsertRecord = this.db.prepare(
      `
      INSERT INTO upload_records (${RECORD_COLUMNS})
      VALUES (
        @customer_id, @extraction_id, @status, @state_at, @retryable, @exhausted, @attempt_count,
        @last_error, @nodes_written, @edges_written, @created_at, @updated_at
      )
      ON CONFLICT (customer_id, extraction_id) DO UPDATE SET
        status = excluded.status,
        state_at = excluded.state_at,
        retryable = excluded.retryable,
        exhausted = excluded.exhausted,
        attempt_count = excluded.attempt_count,
        last_error = excluded.last_error,
        nodes_written = excluded.nodes_written,
        edges_written = excluded.edges_written,
        updated_at = excluded.updated_at
      `
    );
    const appendEvent = this.db.prepare(
      `
      INSERT INTO upload_record_events (
        customer_id, extraction_id, from_status, to_status, attempt_count, error, occurred_at
      )
      VALUES (
        @customer_id, @extraction_id, @from_status, @to_status, @attempt_count, @error, @occurred_at
      )
      `
    );

    const write = this.db.transaction(() => {
      upsertRecord.run(this.toRecordRow(record));
      appendEvent.run({
        customer_id: event.customerId,
        extraction_id: event.extractionId,
        from_status: event.fromStatus,
        to_status: event.toStatus,
        attempt_count: event.attemptCount,
        error: event.error,
        occurred_at: event.occurredAt.toISOString()
      });
    });
    write();
  }

  listEvents(customerId: string, extractionId?: string): UploadRecordEvent[] {
    const rows =
      extractionId === undefined
        ? this.db
            .prepare<[string], UploadRecordEventRow>(
              `
              SELECT customer_id, extraction_id, from_status, to_status, attempt_count, error, occurred_at
              FROM upload_record_events
              WHERE customer_id = ?
              ORDER BY id ASC
              `
            )
            .all(customerId)
        : this.db
            .prepare<[string, string], UploadRecordEventRow>(
              `
              SELECT customer_id, extraction_id, from_status, to_status, attempt_count, error, occurred_at
              FROM upload_record_events
              WHERE customer_id = ? AND extraction_id = ?
              ORDER BY id ASC
              `
            )
            .all(customerId, extractionId);

    return rows.map((row) => ({
      customerId: row.customer_id,
      extractionId: row.extraction_id,
      fromStatus: row.from_status,
      toStatus: row.to_status,
      attemptCount: row.attempt_count,
      error: row.error,
      occurredAt: new Date(row.occurred_at)
    }));
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS upload_records (
        customer_id TEXT NOT NULL,
        extraction_id TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('PENDING', 'IN_PROGRESS', 'SUCCEEDED', 'FAILED')),
        state_at TEXT,
        retryable INTEGER NOT NULL DEFAULT 0,
        exhausted INTEGER NOT NULL DEFAULT 0,
        attempt_count INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        nodes_written INTEGER NOT NULL DEFAULT 0,
        edges_written INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (customer_id, extraction_id)
      );

      CREATE TABLE IF NOT EXISTS upload_record_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        customer_id TEXT NOT NULL,
        extraction_id TEXT NOT NULL,
        from_status TEXT,
        to_status TEXT NOT NULL,
        attempt_count INTEGER NOT NULL,
        error TEXT,
        occurred_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_upload_record_events_key
      ON upload_record_events(customer_id, extraction_id);
    `);
  }

  private toRecordRow(record: UploadRecord): UploadRecordRow {
    return {
      customer_id: record.customerId,
      extraction_id: record.extractionId,
      status: record.state.status,
      state_at: stateTimestamp(record.state)?.toISOString() ?? null,
      retryable: record.state.status === "FAILED" && record.state.retryable ? 1 : 0,
      exhausted: record.state.status === "FAILED" && record.state.exhausted ? 1 : 0,
      attempt_count: record.attemptCount,
      last_error: record.lastError,
      nodes_written: record.nodesWritten,
      edges_written: record.edgesWritten,
      created_at: record.createdAt.toISOString(),
      updated_at: record.updatedAt.toISOString()
    };
  }

  private mapRecordRow(row: UploadRecordRow): UploadRecord {
    return {
      customerId: row.customer_id,
      extractionId: row.extraction_id,
      state: this.mapState(row),
      attemptCount: row.attempt_count,
      lastError: row.last_error,
      nodesWritten: row.nodes_written,
      edgesWritten: row.edges_written,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at)
    };
  }

  private mapState(row: UploadRecordRow): UploadState {
    const at = new Date(row.state_at ?? row.updated_at);
    switch (row.status) {
      case "PENDING":
        return { status: "PENDING" };
      case "IN_PROGRESS":
        return { status: "IN_PROGRESS", startedAt: at };
      case "SUCCEEDED":
        return { status: "SUCCEEDED", completedAt: at };
      case "FAILED":
        return { status: "FAILED", failedAt: at, retryable: row.retryable === 1, exhausted: row.exhausted === 1 };
    }
  }
}

function stateTimestamp(state: UploadState): Date | null {
  switch (state.status) {
    case "PENDING":
      return null;
    case "IN_PROGRESS":
      return state.startedAt;
    case "SUCCEEDED":
      return state.completedAt;
    case "FAILED":
      return state.failedAt;
  }
}
