import { describe, expect, it, vi } from "vitest";
import { ProviderError } from "../src/errors";
import {
  DEFAULT_RETRY_POLICY,
  NO_RETRY,
  calculateDelay,
  isRetryableError,
  retryOrThrow,
  withRetry,
} from "../src/retry";

const noWait = async () => {};

describe("isRetryableError", () => {
  it("recognizes transient provider failures", () => {
    expect(isRetryableError(new Error("[gemini] 503 Service Unavailable"))).toBe(true);
    expect(isRetryableError(new Error("connect ECONNREFUSED 127.0.0.1:6655"))).toBe(true);
    expect(isRetryableError(new Error("Rate limit exceeded"))).toBe(true);
  });

  it("does not retry permanent failures", () => {
    expect(isRetryableError(new Error("[openai] 401 invalid api key"))).toBe(false);
    expect(isRetryableError(new Error("model not found"))).toBe(false);
  });
});

describe("calculateDelay", () => {
  it("grows exponentially and caps at maxDelayMs", () => {
    const midpoint = () => 0.5;
    expect(calculateDelay(1, DEFAULT_RETRY_POLICY, midpoint)).toBe(2000);
    expect(calculateDelay(2, DEFAULT_RETRY_POLICY, midpoint)).toBe(4000);
    expect(calculateDelay(10, DEFAULT_RETRY_POLICY, midpoint)).toBe(30000);
  });
});

describe("withRetry", () => {
  it("makes a single attempt by default", async () => {
    const fn = vi.fn(async () => {
      throw new ProviderError("local", "503 Service Unavailable");
    });

    const outcome = await withRetry(fn, NO_RETRY, undefined, noWait);

    expect(outcome.success).toBe(false);
    expect(outcome.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries retryable errors until an attempt succeeds", async () => {
    const wait = vi.fn(noWait);
    let calls = 0;

    const result = await retryOrThrow(
      async (attempt) => {
        calls += 1;
        if (attempt < 3) {
          throw new Error("502 Bad Gateway");
        }
        return "ok";
      },
      { ...DEFAULT_RETRY_POLICY, maxAttempts: 5 },
      undefined,
      wait,
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it("rethrows the last error when attempts run out", async () => {
    const error = new ProviderError("gemini", "429 Too Many Requests");

    await expect(
      retryOrThrow(
        async () => {
          throw error;
        },
        { ...DEFAULT_RETRY_POLICY, maxAttempts: 2 },
        undefined,
        noWait,
      ),
    ).rejects.toBe(error);
  });

  it("honours a custom isRetryable", async () => {
    const fn = vi.fn(async () => {
      throw new Error("503");
    });

    await withRetry(fn, { ...DEFAULT_RETRY_POLICY, isRetryable: () => false }, undefined, noWait);

    expect(fn).toHaveBeenCalledTimes(1);
  });
});
