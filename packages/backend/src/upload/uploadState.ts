import type { UploadRecord, UploadRecordEvent, UploadState, UploadStatus } from "@customer-graph/shared";
import { InvalidStateTransitionError } from "../errors.js";

const allowedTransitions: Record<UploadStatus, readonly UploadStatus[]> = {
  PENDING: ["IN_PROGRESS"],
  IN_PROGRESS: ["SUCCEEDED", "FAILED"],
  SUCCEEDED: [],
  FAILED: ["PENDING"]
};

export function canTransition(from: UploadState, to: UploadStatus): boolean {
  if (!allowedTransitions[from.status].includes(to)) {
    return false;
  }
  // A failure that cannot be retried stays failed.
  return !(from.status === "FAILED" && isTerminal(from));
}

/** SUCCEEDED, or FAILED with no retry left. */
export function isTerminal(state: UploadState): boolean {
  if (state.status === "SUCCEEDED") {
    return true;
  }
  return state.status === "FAILED" && (state.exhausted || !state.retryable);
}

export interface RecordPatch {
  attemptCount?: number;
  lastError?: string | null;
  nodesWritten?: number;
  edgesWritten?: number;
}

export interface TransitionResult {
  record: UploadRecord;
  event: UploadRecordEvent;
}

export function createPendingRecord(customerId: string, extractionId: string, now: Date): TransitionResult {
  const record: UploadRecord = {
    customerId,
    extractionId,
    state: { status: "PENDING" },
    attemptCount: 0,
    lastError: null,
    nodesWritten: 0,
    edgesWritten: 0,
    createdAt: now,
    updatedAt: now
  };

  return {
    record,
    event: {
      customerId,
      extractionId,
      fromStatus: null,
      toStatus: "PENDING",
      attemptCount: 0,
      error: null,
      occurredAt: now
    }
  };
}

export function transition(
  record: UploadRecord,
  next: UploadState,
  patch: RecordPatch,
  now: Date
): TransitionResult {
  if (!canTransition(record.state, next.status)) {
    throw new InvalidStateTransitionError(record.state.status, next.status, {
      customerId: record.customerId,
      extractionId: record.extractionId
    });
  }

  const updated: UploadRecord = {
    ...record,
    ...patch,
    state: next,
    updatedAt: now
  };

  return {
    record: updated,
    event: {
      customerId: record.customerId,
      extractionId: record.extractionId,
      fromStatus: record.state.status,
      toStatus: next.status,
      attemptCount: updated.attemptCount,
      error: next.status === "FAILED" ? updated.lastError : null,
      occurredAt: now
    }
  };
}
