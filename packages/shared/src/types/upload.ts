export type UploadStatus = "PENDING" | "IN_PROGRESS" | "SUCCEEDED" | "FAILED";

export type UploadState =
  | { status: "PENDING" }
  | { status: "IN_PROGRESS"; startedAt: Date }
  | { status: "SUCCEEDED"; completedAt: Date }
  | { status: "FAILED"; failedAt: Date; retryable: boolean; exhausted: boolean };

export interface UploadRecord {
  customerId: string;
  extractionId: string;
  state: UploadState;
  attemptCount: number;
  lastError: string | null;
  nodesWritten: number;
  edgesWritten: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface UploadRecordEvent {
  customerId: string;
  extractionId: string;
  fromStatus: UploadStatus | null;
  toStatus: UploadStatus;
  attemptCount: number;
  error: string | null;
  occurredAt: Date;
}

export interface BulkUploadRequest {
  customerId: string;
  dryRun: boolean;
}

export type WriteState = "nothing_written" | "partially_written";

export interface ExtractionUploadOutcome {
  extractionId: string;
  status: UploadStatus | "VALIDATED" | "INVALID";
  attempts: number;
  nodesWritten: number;
  edgesWritten: number;
  writeState?: WriteState;
  error?: string;
}

export interface BulkUploadResult {
  customerId: string;
  dryRun: boolean;
  processed: number;
  succeeded: number;
  failed: number;
  cancelled: boolean;
  durationSeconds: number;
  outcomes: ExtractionUploadOutcome[];
}
