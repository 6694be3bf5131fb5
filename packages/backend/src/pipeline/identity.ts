import { createHash, randomBytes } from "node:crypto";
import type { EntityType, RelationshipType } from "@customer-graph/shared";

const KEY_COMPONENT_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, " ");
}

export function entityKey(type: EntityType, label: string): string {
  return `${type}:${normalizeLabel(label)}`;
}

/**
 * Content-derived entity id. Stable across runs for the same type and
 * normalized label, so re-extraction and re-upload address the same vertex.
 */
export function entityId(type: EntityType, label: string): string {
  const digest = createHash("sha256").update(entityKey(type, label)).digest("hex").slice(0, 16);
  return `${type.toLowerCase()}_${digest}`;
}

export function relationshipId(sourceId: string, type: RelationshipType, targetId: string): string {
  return `${sourceId}|${type}|${targetId}`;
}

/**
 * `{epochMillis padded to 13 digits}_{8 hex}`: lexical order follows creation time.
 */
export function createExtractionId(now: Date = new Date(), suffix?: string): string {
  const millis = String(now.getTime()).padStart(13, "0");
  const tail = suffix ?? randomBytes(4).toString("hex");
  return `${millis}_${tail}`;
}

export function isSafeKeyComponent(value: string): boolean {
  return KEY_COMPONENT_PATTERN.test(value) && !value.includes("..");
}
