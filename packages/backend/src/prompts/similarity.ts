import type { RelatednessSubject } from "../services/llmTypes.js";

export const SIMILARITY_SYSTEM_PROMPT = `
You judge how closely two attributes of the same customer are related.
Both attributes were extracted from one interview analysis.

Rules:
1. Judge semantic relatedness only. Ignore spelling and word order.
2. Use 0.0 for unrelated attributes and 1.0 for the same idea said differently.
3. Do not invent facts about the customer.

Respond with JSON only:
{
  "score": 0.0,
  "reasoning": "one short sentence"
}
`.trim();

export function buildSimilarityPrompt(a: RelatednessSubject, b: RelatednessSubject): string {
  return [
    `Attribute A (${a.type.toLowerCase()}): ${a.label}`,
    `Attribute B (${b.type.toLowerCase()}): ${b.label}`
  ].join("\n");
}
