import { describe, expect, it } from "vitest";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";

function statusError(message: string, status: number): Error {
  return Object.assign(new Error(message), { status });
}

describe("LLMRateLimiter", () => {
  it("retries rate-limited calls with backoff", async () => {
    const limiter = new LLMRateLimiter({
      maxConcurrent: 1,
      maxRetries: 3,
      retryDelayMs: 1,
      requestsPerMinute: 100,
      timeoutMs: 5000
    });

    let attempt = 0;
    const result = await limiter.run(async () => {
      attempt += 1;
      if (attempt < 3) {
        throw statusError("rate limited", 429);
      }
      return "ok";
    });

    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("does not retry client errors", async () => {
    const limiter = new LLMRateLimiter({ maxConcurrent: 1, maxRetries: 3, retryDelayMs: 1, timeoutMs: 5000 });

    let attempt = 0;
    await expect(
      limiter.run(async () => {
        attempt += 1;
        throw statusError("bad request", 400);
      })
    ).rejects.toThrow("bad request");
    expect(attempt).toBe(1);
  });

  it("times out slow calls", async () => {
    const limiter = new LLMRateLimiter({ maxConcurrent: 1, maxRetries: 0, retryDelayMs: 1, timeoutMs: 10 });

    await expect(limiter.run(() => new Promise<string>(() => {}))).rejects.toThrow(
      "LLM request timeout after 10ms"
    );
  });

  it("honors maxConcurrent", async () => {
    const limiter = new LLMRateLimiter({
      maxConcurrent: 2,
      maxRetries: 0,
      retryDelayMs: 1,
      requestsPerMinute: 100,
      timeoutMs: 5000
    });

    let inFlight = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }).map((_, idx) =>
        limiter.run(async () => {
          inFlight += 1;
          peak = Math.max(peak, inFlight);
          await new Promise((resolve) => {
            setTimeout(resolve, 20 + idx * 2);
          });
          inFlight -= 1;
          return idx;
        })
      )
    );

    expect(peak).toBe(2);
  });
});
