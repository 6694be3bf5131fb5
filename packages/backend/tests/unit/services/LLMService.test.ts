import { describe, expect, it, vi } from "vitest";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";
import { LLMService } from "../../../src/services/LLMService.js";
import type { ChatCompletionResponse } from "../../../src/services/llmTypes.js";

function completion(content: string): ChatCompletionResponse {
  return {
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 1000, completion_tokens: 500 }
  };
}

function createService(create: ReturnType<typeof vi.fn>) {
  return new LLMService(
    {
      apiKey: "test-secret",
      chatModel: "test-model"
    },
    {
      client: { chat: { completions: { create } } },
      rateLimiter: new LLMRateLimiter({
        maxConcurrent: 1,
        maxRetries: 0,
        retryDelayMs: 1,
        requestsPerMinute: 100,
        timeoutMs: 1000
      })
    }
  );
}

describe("LLMService", () => {
  it("scores relatedness from a JSON response and records usage", async () => {
    const create = vi.fn().mockResolvedValue(completion(JSON.stringify({ score: 0.82, reasoning: "same domain" })));
    const service = createService(create);

    const result = await service.scoreRelatedness(
      { label: "Financial planning", type: "SKILL" },
      { label: "Wealth management", type: "CONCEPT" },
      { customerId: "cust-001" }
    );

    expect(result).toEqual({ score: 0.82, reasoning: "same domain" });
    expect(create).toHaveBeenCalledTimes(1);
    expect(create.mock.calls[0]?.[0]).toMatchObject({
      model: "test-model",
      response_format: { type: "json_object" },
      messages: [
        { role: "system" },
        {
          role: "user",
          content: "Attribute A (skill): Financial planning\nAttribute B (concept): Wealth management"
        }
      ]
    });

    const [usage] = service.getUsageRecords();
    expect(usage).toMatchObject({
      customerId: "cust-001",
      phase: "similarity",
      model: "test-model",
      promptTokens: 1000,
      completionTokens: 500
    });
    expect(usage?.estimatedCost).toBeCloseTo(0.00045, 8);
  });

  it("extracts JSON wrapped in prose", async () => {
    const create = vi.fn().mockResolvedValue(completion('Here you go: {"score": "0.4"} hope it helps'));
    const service = createService(create);

    const result = await service.scoreRelatedness(
      { label: "Budgeting", type: "SKILL" },
      { label: "Travel", type: "CONCEPT" }
    );

    expect(result).toEqual({ score: 0.4, reasoning: "" });
  });

  it("rejects scores outside the unit interval", async () => {
    const create = vi.fn().mockResolvedValue(completion(JSON.stringify({ score: 3 })));
    const service = createService(create);

    await expect(
      service.scoreRelatedness({ label: "Budgeting", type: "SKILL" }, { label: "Travel", type: "CONCEPT" })
    ).rejects.toThrow();
  });
});
