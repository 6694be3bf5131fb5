import type { EntityType } from "@customer-graph/shared";

export interface RelatednessSubject {
  label: string;
  type: EntityType;
}

export interface RelatednessResult {
  score: number;
  reasoning: string;
}

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export type TokenUsagePhase = "similarity";

export interface TokenUsageRecord {
  customerId?: string;
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  estimatedCost: number;
  timestamp: Date;
}

export type ChatCompletionMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export interface ChatCompletionParams {
  model: string;
  temperature: number;
  max_tokens: number;
  response_format: { type: "json_object" };
  messages: ChatCompletionMessage[];
}

export interface CompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
}

export interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  usage?: CompletionUsage | null;
}

/** The slice of an OpenAI-compatible SDK client the service calls. */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(params: ChatCompletionParams): Promise<ChatCompletionResponse>;
    };
  };
}

export interface LLMServiceLike {
  scoreRelatedness(
    a: RelatednessSubject,
    b: RelatednessSubject,
    options?: { customerId?: string }
  ): Promise<RelatednessResult>;
}
