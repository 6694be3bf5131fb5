import type { Entity, GraphProperties, GraphPropertyValue, Relationship } from "@customer-graph/shared";

/** Flattens an entity into graph vertex properties. Nested values are stored as JSON text. */
export function toVertexProperties(entity: Entity): GraphProperties {
  const properties: GraphProperties = {
    customerId: entity.customerId,
    extractionId: entity.extractionId
  };

  for (const [key, value] of Object.entries(entity.properties)) {
    properties[key] = toPropertyValue(value);
  }

  // Identity and provenance always win over free-form properties.
  properties.customerId = entity.customerId;
  properties.extractionId = entity.extractionId;
  properties.label = entity.label;
  properties.confidence = entity.confidence;
  properties.source = entity.source;
  properties.sources = [...entity.sources];
  properties.createdAt = entity.createdAt;
  return properties;
}

export function toEdgeProperties(edge: Relationship): GraphProperties {
  return {
    customerId: edge.customerId,
    extractionId: edge.extractionId,
    confidence: edge.confidence,
    evidence: [...edge.evidence],
    reasoning: edge.reasoning,
    source: edge.source
  };
}

function toPropertyValue(value: unknown): GraphPropertyValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    const strings = value.filter((item): item is string => typeof item === "string");
    if (strings.length === value.length) {
      return strings;
    }
  }
  return JSON.stringify(value);
}
