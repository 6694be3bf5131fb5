import type { WriteState } from "@customer-graph/shared";

export type FailureStage = "extraction" | "relationships" | "assembly" | "storage" | "upload";

export interface ErrorContext {
  customerId?: string;
  extractionId?: string;
  stage?: FailureStage;
  [key: string]: unknown;
}

export type CustomerGraphErrorCode =
  | "MISSING_PRIMARY_SUBJECT"
  | "EMPTY_GRAPH"
  | "CROSS_CUSTOMER_VIOLATION"
  | "UPLOAD_TIMEOUT"
  | "PARTIAL_UPLOAD_FAILURE"
  | "EVIDENCE_MISSING"
  | "INVALID_KEY_COMPONENT"
  | "SNAPSHOT_NOT_FOUND"
  | "SNAPSHOT_EXISTS"
  | "INVALID_SNAPSHOT"
  | "INVALID_STATE_TRANSITION";

export abstract class CustomerGraphError extends Error {
  abstract readonly code: CustomerGraphErrorCode;
  abstract readonly retryable: boolean;
  readonly context: ErrorContext;
  writeState: WriteState = "nothing_written";

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      writeState: this.writeState,
      context: this.context
    };
  }
}

export class MissingPrimarySubjectError extends CustomerGraphError {
  readonly code = "MISSING_PRIMARY_SUBJECT";
  readonly retryable = false;

  constructor(context: ErrorContext) {
    super(
      `No primary subject could be derived for extraction ${context.extractionId ?? "unknown"}`,
      { stage: "extraction", ...context }
    );
  }
}

export class EmptyGraphError extends CustomerGraphError {
  readonly code = "EMPTY_GRAPH";
  readonly retryable = false;

  constructor(context: ErrorContext) {
    super(`Extraction ${context.extractionId ?? "unknown"} produced no entities`, {
      stage: "assembly",
      ...context
    });
  }
}

export class CrossCustomerViolationError extends CustomerGraphError {
  readonly code = "CROSS_CUSTOMER_VIOLATION";
  readonly retryable = false;

  constructor(expectedCustomerId: string, actualCustomerId: string, context: ErrorContext = {}) {
    super(
      `Data for customer ${actualCustomerId} encountered while processing ${expectedCustomerId}`,
      { stage: "upload", ...context, customerId: expectedCustomerId, actualCustomerId }
    );
  }
}

export class UploadTimeoutError extends CustomerGraphError {
  readonly code = "UPLOAD_TIMEOUT";
  readonly retryable = true;

  constructor(operation: string, timeoutMs: number, context: ErrorContext = {}) {
    super(`${operation} timed out after ${timeoutMs}ms`, { stage: "upload", ...context, operation });
  }
}

export class PartialUploadFailureError extends CustomerGraphError {
  readonly code = "PARTIAL_UPLOAD_FAILURE";
  readonly retryable = true;
  readonly nodesWritten: number;
  readonly edgesWritten: number;

  constructor(
    progress: { nodesWritten: number; edgesWritten: number },
    context: ErrorContext,
    cause: unknown
  ) {
    super(
      `Upload interrupted after ${progress.nodesWritten} vertices and ${progress.edgesWritten} edges: ${describeError(cause)}`,
      { stage: "upload", ...context },
      { cause }
    );
    this.nodesWritten = progress.nodesWritten;
    this.edgesWritten = progress.edgesWritten;
    this.writeState =
      progress.nodesWritten > 0 || progress.edgesWritten > 0 ? "partially_written" : "nothing_written";
  }
}

export class EvidenceMissingError extends CustomerGraphError {
  readonly code = "EVIDENCE_MISSING";
  readonly retryable = false;

  constructor(edgeKey: string, context: ErrorContext = {}) {
    super(`Relationship ${edgeKey} has no supporting evidence`, {
      stage: "relationships",
      ...context,
      edgeKey
    });
  }
}

export class InvalidKeyComponentError extends CustomerGraphError {
  readonly code = "INVALID_KEY_COMPONENT";
  readonly retryable = false;

  constructor(field: string, value: string) {
    super(`Invalid ${field}: ${JSON.stringify(value)}`, { stage: "storage", field });
  }
}

export class SnapshotNotFoundError extends CustomerGraphError {
  readonly code = "SNAPSHOT_NOT_FOUND";
  readonly retryable = false;

  constructor(context: ErrorContext) {
    super(
      `Snapshot ${context.customerId ?? "?"}/${context.extractionId ?? "?"} not found`,
      { stage: "upload", ...context }
    );
  }
}

export class SnapshotExistsError extends CustomerGraphError {
  readonly code = "SNAPSHOT_EXISTS";
  readonly retryable = false;

  constructor(context: ErrorContext) {
    super(
      `Snapshot ${context.customerId ?? "?"}/${context.extractionId ?? "?"} already exists`,
      { stage: "storage", ...context }
    );
  }
}

/** A stored snapshot that cannot be decoded or breaks graph invariants. */
export class InvalidSnapshotError extends CustomerGraphError {
  readonly code = "INVALID_SNAPSHOT";
  readonly retryable = false;

  constructor(reason: string, context: ErrorContext, options?: { cause?: unknown }) {
    super(
      `Snapshot ${context.customerId ?? "?"}/${context.extractionId ?? "?"} is invalid: ${reason}`,
      { stage: "storage", ...context, reason },
      options
    );
  }
}

export class InvalidStateTransitionError extends CustomerGraphError {
  readonly code = "INVALID_STATE_TRANSITION";
  readonly retryable = false;

  constructor(from: string, to: string, context: ErrorContext = {}) {
    super(`Illegal upload state transition ${from} -> ${to}`, { stage: "upload", ...context });
  }
}

export function isCustomerGraphError(error: unknown): error is CustomerGraphError {
  return error instanceof CustomerGraphError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "Unknown error";
}
