import { describe, it, expect, vi } from "vitest";
import { retry } from "../../src/utils/retry.js";

describe("retry", () => {
  it("returns on first success", async () => {
    const result = await retry(async () => "ok");
    expect(result).toBe("ok");
  });

  it("retries on failure then succeeds", async () => {
    let attempt = 0;
    const result = await retry(
      async () => {
        attempt++;
        if (attempt < 3) throw new Error("fail");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 10 },
    );
    expect(result).toBe("ok");
    expect(attempt).toBe(3);
  });

  it("throws after max attempts", async () => {
    await expect(
      retry(
        async () => {
          throw new Error("always fails");
        },
        { maxAttempts: 2, baseDelayMs: 10 },
      ),
    ).rejects.toThrow("always fails");
  });

  it("respects abort signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      retry(
        async () => {
          throw new Error("fail");
        },
        { maxAttempts: 5, baseDelayMs: 10, signal: controller.signal },
      ),
    ).rejects.toThrow();
  });

  it("passes attempt number to function", async () => {
    const attempts: number[] = [];
    await retry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error("fail");
        return "ok";
      },
      { maxAttempts: 3, baseDelayMs: 10 },
    );
    expect(attempts).toEqual([0, 1, 2]);
  });

  it("stops when shouldRetry declines", async () => {
    const fn = vi.fn(async () => {
      throw new Error("bad request");
    });
    await expect(
      retry(fn, { maxAttempts: 5, baseDelayMs: 10, shouldRetry: () => false }),
    ).rejects.toThrow("bad request");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("reports each retry before sleeping", async () => {
    const onRetry = vi.fn();
    await expect(
      retry(
        async () => {
          throw new Error("unavailable");
        },
        { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 20, onRetry },
      ),
    ).rejects.toThrow("unavailable");

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map((call) => call[1])).toEqual([0, 1]);
    for (const [, , delayMs] of onRetry.mock.calls) {
      expect(delayMs).toBeGreaterThanOrEqual(5);
      expect(delayMs).toBeLessThanOrEqual(20);
    }
  });
});
