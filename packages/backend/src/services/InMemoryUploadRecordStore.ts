import type { UploadRecord, UploadRecordEvent } from "@customer-graph/shared";
import type { UploadRecordStoreLike } from "./UploadRecordStore.js";

export class InMemoryUploadRecordStore implements UploadRecordStoreLike {
  private readonly records = new Map<string, UploadRecord>();
  private readonly events: UploadRecordEvent[] = [];

  close(): void {
    this.records.clear();
    this.events.length = 0;
  }

  get(customerId: string, extractionId: string): UploadRecord | null {
    const record = this.records.get(recordKey(customerId, extractionId));
    return record ? cloneRecord(record) : null;
  }

  listByCustomer(customerId: string): UploadRecord[] {
    return [...this.records.values()]
      .filter((record) => record.customerId === customerId)
      .sort((a, b) => a.extractionId.localeCompare(b.extractionId))
      .map((record) => cloneRecord(record));
  }

  save(record: UploadRecord, event: UploadRecordEvent): void {
    this.records.set(recordKey(record.customerId, record.extractionId), cloneRecord(record));
    this.events.push({ ...event });
  }

  listEvents(customerId: string, extractionId?: string): UploadRecordEvent[] {
    return this.events
      .filter(
        (event) =>
          event.customerId === customerId && (extractionId === undefined || event.extractionId === extractionId)
      )
      .map((event) => ({ ...event }));
  }
}

function recordKey(customerId: string, extractionId: string): string {
  return `${customerId}\u0000${extractionId}`;
}

function cloneRecord(record: UploadRecord): UploadRecord {
  return { ...record, state: { ...record.state } };
}
