import { describe, expect, it, vi } from "vitest";
import { NavigationTimeoutError } from "../errors";
import { NAVIGATION_RETRY_OPTIONS, RetryError, withRetry } from "./retry";

describe("withRetry", () => {
  it("backs off exponentially until the operation succeeds", async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValue("ok");

    const result = await withRetry(operation, {
      maxRetries: 2,
      baseDelayMs: 100,
      jitterMs: 0,
      sleep,
    });

    expect(result).toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it("wraps the last error once retries are exhausted", async () => {
    const failure = new Error("still down");
    const error = await withRetry(() => Promise.reject(failure), {
      maxRetries: 1,
      baseDelayMs: 0,
      jitterMs: 0,
      sleep: async () => undefined,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    if (!(error instanceof RetryError)) return;
    expect(error.message).toBe("Operation failed after 2 attempts");
    expect(error.attempt).toBe(2);
    expect(error.originalError).toBe(failure);
  });

  it("rethrows errors the retry condition rejects", async () => {
    const operation = vi.fn(() => Promise.reject(new Error("selector missing")));

    await expect(
      withRetry(operation, { ...NAVIGATION_RETRY_OPTIONS, sleep: async () => undefined }),
    ).rejects.toThrow("selector missing");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("retries navigation timeouts under the navigation preset", async () => {
    const operation = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new NavigationTimeoutError("page load", 1000))
      .mockResolvedValue(7);

    await expect(
      withRetry(operation, { ...NAVIGATION_RETRY_OPTIONS, sleep: async () => undefined }),
    ).resolves.toBe(7);
  });
});
