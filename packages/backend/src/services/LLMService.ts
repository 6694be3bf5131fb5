import OpenAI from "openai";
import { z } from "zod";
import { appConfig } from "../config.js";
import { SIMILARITY_SYSTEM_PROMPT, buildSimilarityPrompt } from "../prompts/similarity.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  CompletionUsage,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  RelatednessResult,
  RelatednessSubject,
  TokenUsagePhase,
  TokenUsageRecord
} from "./llmTypes.js";

const relatednessSchema = z.object({
  score: z.coerce.number().min(0).max(1),
  reasoning: z.string().default("")
});

const modelCostPerThousandTokens: Record<TokenUsagePhase, { input: number; output: number }> = {
  similarity: { input: 0.00015, output: 0.0006 }
};

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      temperature: config.temperature ?? 0,
      maxTokens: config.maxTokens ?? 200,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 60_000
    };

    this.client = deps?.client ?? createOpenAIClient(this.config.apiKey, this.config.baseURL);

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    return new LLMService({
      apiKey: appConfig.LLM_API_KEY,
      baseURL: appConfig.LLM_BASE_URL,
      chatModel: appConfig.LLM_CHAT_MODEL,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS
    });
  }

  async scoreRelatedness(
    a: RelatednessSubject,
    b: RelatednessSubject,
    options?: { customerId?: string }
  ): Promise<RelatednessResult> {
    const response = await this.rateLimiter.run(() =>
      this.client.chat.completions.create({
        model: this.config.chatModel,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        response_format: { type: "json_object" },
        messages: [
          { role: "system", content: SIMILARITY_SYSTEM_PROMPT },
          { role: "user", content: buildSimilarityPrompt(a, b) }
        ]
      })
    );

    const content = response.choices?.[0]?.message?.content ?? "{}";
    const parsed = relatednessSchema.parse(safeJsonParse(content));

    this.recordUsage("similarity", this.config.chatModel, response.usage, options?.customerId);
    return parsed;
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  private recordUsage(
    phase: TokenUsagePhase,
    model: string,
    usage: CompletionUsage | null | undefined,
    customerId?: string
  ): void {
    const promptTokens = usage?.prompt_tokens ?? 0;
    const completionTokens = usage?.completion_tokens ?? 0;
    const costSpec = modelCostPerThousandTokens[phase];
    const estimatedCost =
      (promptTokens / 1000) * costSpec.input + (completionTokens / 1000) * costSpec.output;

    const record: TokenUsageRecord = {
      phase,
      model,
      promptTokens,
      completionTokens,
      estimatedCost,
      timestamp: new Date()
    };
    if (customerId !== undefined) {
      record.customerId = customerId;
    }
    this.usageRecords.push(record);
  }
}

function createOpenAIClient(apiKey: string, baseURL: string): OpenAICompatibleClient {
  const openai = new OpenAI({ apiKey, baseURL });
  return {
    chat: {
      completions: {
        create: (params) => openai.chat.completions.create(params)
      }
    }
  };
}

function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    const match = input.match(/\{[\s\S]*\}/);
    if (!match) {
      return {};
    }
    try {
      return JSON.parse(match[0]);
    } catch {
      return {};
    }
  }
}
