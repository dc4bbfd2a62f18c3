import { describe, it, expect, vi } from "vitest";
import { ConnectRetryPolicy } from "../../src/core/transport/ConnectRetryPolicy";
import { ConfigurationError, ConnectionError, TimeoutError } from "../../src/errors";
import { retryWithBackoff } from "../../src/utils/retry";

describe("retryWithBackoff", () => {
  it("should return the first successful result", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    const result = await retryWithBackoff(operation, {
      maxAttempts: 3,
      backoffMs: () => 1,
      shouldRetry: () => true,
      onRetry,
    });

    expect(result).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0]?.[1]).toBe(1);
    expect(onRetry.mock.calls[0]?.[2]).toBe(1);
  });

  it("should throw the last error once attempts run out", async () => {
    let calls = 0;
    const operation = async (): Promise<never> => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(
      retryWithBackoff(operation, { maxAttempts: 3, backoffMs: () => 1, shouldRetry: () => true })
    ).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
  });

  it("should stop on errors that are not retried", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("fatal"));

    await expect(
      retryWithBackoff(operation, { maxAttempts: 5, backoffMs: () => 1, shouldRetry: () => false })
    ).rejects.toThrow("fatal");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("should not wait past the deadline", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));

    await expect(
      retryWithBackoff(operation, {
        maxAttempts: Infinity,
        backoffMs: () => 1000,
        shouldRetry: () => true,
        deadline: Date.now() + 100,
      })
    ).rejects.toThrow("down");
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe("ConnectRetryPolicy", () => {
  it("should retry only failures to reach the NetApp", () => {
    const policy = new ConnectRetryPolicy();
    expect(policy.shouldRetry(new ConnectionError("refused"), 1)).toBe(true);
    expect(policy.shouldRetry(new TimeoutError("timed out", 10), 1)).toBe(true);
    expect(policy.shouldRetry(new ConfigurationError("bad address"), 1)).toBe(false);
  });

  it("should stop after the retry limit", () => {
    const policy = new ConnectRetryPolicy(2);
    expect(policy.shouldRetry(new ConnectionError("refused"), 2)).toBe(true);
    expect(policy.shouldRetry(new ConnectionError("refused"), 3)).toBe(false);
    expect(policy.getMaxRetries()).toBe(2);
  });

  it("should grow the delay linearly up to five base delays", () => {
    const policy = new ConnectRetryPolicy(Infinity, 100);
    expect([1, 2, 3, 5, 9].map((attempt) => policy.getDelay(attempt))).toEqual([100, 200, 300, 500, 500]);
  });
});
