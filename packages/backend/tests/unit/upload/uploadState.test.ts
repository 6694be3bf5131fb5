import { describe, expect, it } from "vitest";
import type { UploadState } from "@customer-graph/shared";
import { InvalidStateTransitionError } from "../../../src/errors.js";
import { canTransition, createPendingRecord, isTerminal, transition } from "../../../src/upload/uploadState.js";

const now = new Date("2026-03-01T10:00:00.000Z");
const later = new Date("2026-03-01T10:01:00.000Z");

const failed = (retryable: boolean, exhausted: boolean): UploadState => ({
  status: "FAILED",
  failedAt: now,
  retryable,
  exhausted
});

describe("upload state machine", () => {
  it("allows only the documented transitions", () => {
    expect(canTransition({ status: "PENDING" }, "IN_PROGRESS")).toBe(true);
    expect(canTransition({ status: "PENDING" }, "SUCCEEDED")).toBe(false);
    expect(canTransition({ status: "IN_PROGRESS", startedAt: now }, "SUCCEEDED")).toBe(true);
    expect(canTransition({ status: "IN_PROGRESS", startedAt: now }, "FAILED")).toBe(true);
    expect(canTransition({ status: "SUCCEEDED", completedAt: now }, "PENDING")).toBe(false);
    expect(canTransition(failed(true, false), "PENDING")).toBe(true);
    expect(canTransition(failed(true, true), "PENDING")).toBe(false);
    expect(canTransition(failed(false, false), "PENDING")).toBe(false);
  });

  it("treats success and unrecoverable failures as terminal", () => {
    expect(isTerminal({ status: "SUCCEEDED", completedAt: now })).toBe(true);
    expect(isTerminal(failed(false, false))).toBe(true);
    expect(isTerminal(failed(true, true))).toBe(true);
    expect(isTerminal(failed(true, false))).toBe(false);
    expect(isTerminal({ status: "IN_PROGRESS", startedAt: now })).toBe(false);
  });

  it("applies the patch and emits a transition event", () => {
    const { record } = createPendingRecord("cust-001", "1772359200000_00000001", now);
    const started = transition(record, { status: "IN_PROGRESS", startedAt: later }, { attemptCount: 1 }, later);

    expect(started.record).toMatchObject({
      state: { status: "IN_PROGRESS", startedAt: later },
      attemptCount: 1,
      createdAt: now,
      updatedAt: later
    });
    expect(started.event).toEqual({
      customerId: "cust-001",
      extractionId: "1772359200000_00000001",
      fromStatus: "PENDING",
      toStatus: "IN_PROGRESS",
      attemptCount: 1,
      error: null,
      occurredAt: later
    });
    expect(record.state.status).toBe("PENDING");
  });

  it("throws on an illegal transition", () => {
    const { record } = createPendingRecord("cust-001", "1772359200000_00000001", now);
    expect(() => transition(record, { status: "SUCCEEDED", completedAt: later }, {}, later)).toThrow(
      InvalidStateTransitionError
    );
  });
});
