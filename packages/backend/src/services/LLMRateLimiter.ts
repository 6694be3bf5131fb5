import { sleep, withTimeout } from "../utils/async.js";
import type { LLMRateLimitConfig } from "./llmTypes.js";

type QueuedRun = () => Promise<void>;

export class LLMRateLimiter {
  private readonly config: LLMRateLimitConfig;
  private activeCount = 0;
  private readonly queue: QueuedRun[] = [];
  private readonly requestTimestamps: number[] = [];
  private waitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: Partial<LLMRateLimitConfig> = {}) {
    this.config = {
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 30,
      timeoutMs: config.timeoutMs ?? 60_000
    };
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => this.executeTask(task, resolve, reject));
      this.drainQueue();
    });
  }

  private drainQueue(): void {
    this.clearWaitTimer();
    this.pruneRequestWindow();

    while (this.activeCount < this.config.maxConcurrent && this.queue.length > 0) {
      const waitMs = this.getWaitMsForRateLimit();
      if (waitMs > 0) {
        this.waitTimer = setTimeout(() => {
          this.waitTimer = null;
          this.drainQueue();
        }, waitMs);
        return;
      }

      const next = this.queue.shift();
      if (!next) {
        return;
      }

      this.activeCount += 1;
      this.requestTimestamps.push(Date.now());
      void next().finally(() => {
        this.activeCount -= 1;
        this.drainQueue();
      });
    }
  }

  private async executeTask<T>(
    task: () => Promise<T>,
    resolve: (value: T) => void,
    reject: (reason: unknown) => void
  ): Promise<void> {
    let attempt = 0;

    while (true) {
      try {
        const result = await withTimeout(
          task(),
          this.config.timeoutMs,
          () => new Error(`LLM request timeout after ${this.config.timeoutMs}ms`)
        );
        resolve(result);
        return;
      } catch (error) {
        const shouldRetry = isRetryableError(error) && attempt < this.config.maxRetries;
        if (!shouldRetry) {
          reject(error);
          return;
        }

        attempt += 1;
        await sleep(this.config.retryDelayMs * 2 ** (attempt - 1));
      }
    }
  }

  private pruneRequestWindow(): void {
    const cutoff = Date.now() - 60_000;
    while (this.requestTimestamps.length > 0) {
      const first = this.requestTimestamps[0];
      if (first === undefined || first >= cutoff) {
        break;
      }
      this.requestTimestamps.shift();
    }
  }

  private getWaitMsForRateLimit(): number {
    if (this.requestTimestamps.length < this.config.requestsPerMinute) {
      return 0;
    }

    const firstInWindow = this.requestTimestamps[0];
    if (!firstInWindow) {
      return 0;
    }

    const elapsed = Date.now() - firstInWindow;
    return Math.max(0, 60_000 - elapsed);
  }

  private clearWaitTimer(): void {
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
  }
}

function isRetryableError(error: unknown): boolean {
  if (typeof error !== "object" || error === null) {
    return false;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status === 429 || error.status >= 500;
  }
  if ("code" in error && typeof error.code === "string") {
    return ["ETIMEDOUT", "ECONNRESET", "ECONNABORTED"].includes(error.code);
  }
  if ("message" in error && typeof error.message === "string") {
    return /timeout|timed out|temporarily unavailable/i.test(error.message);
  }
  return false;
}
