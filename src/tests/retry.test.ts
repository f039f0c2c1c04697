import { describe, expect, it, vi } from "vitest";
import { retryWithBackoff } from "@/lib/utils/retry";

describe("retryWithBackoff", () => {
  it("retries until the operation succeeds", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValue("ok");
    const onRetry = vi.fn();

    await expect(retryWithBackoff(operation, { baseDelayMs: 0, onRetry })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(([, attempt, delayMs]) => [attempt, delayMs])).toEqual([
      [1, 0],
      [2, 0],
    ]);
  });

  it("doubles the delay on each attempt", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));
    const delays: number[] = [];

    await expect(
      retryWithBackoff(operation, {
        maxRetries: 2,
        baseDelayMs: 5,
        onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
      }),
    ).rejects.toThrow("down");
    expect(operation).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([5, 10]);
  });

  it("stops at the first error the caller marks as permanent", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("bad request"));

    await expect(
      retryWithBackoff(operation, { baseDelayMs: 0, shouldRetry: () => false }),
    ).rejects.toThrow("bad request");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("does not start when the signal is already aborted", async () => {
    const operation = vi.fn<() => Promise<string>>().mockResolvedValue("ok");
    const controller = new AbortController();
    controller.abort();

    await expect(retryWithBackoff(operation, { signal: controller.signal })).rejects.toMatchObject({
      name: "AbortError",
    });
    expect(operation).not.toHaveBeenCalled();
  });

  it("stops waiting out the backoff once the signal aborts", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));
    const controller = new AbortController();

    const startedAt = Date.now();
    await expect(
      retryWithBackoff(operation, {
        baseDelayMs: 60_000,
        signal: controller.signal,
        onRetry: () => queueMicrotask(() => controller.abort()),
      }),
    ).rejects.toMatchObject({ name: "AbortError" });

    expect(operation).toHaveBeenCalledTimes(1);
    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });
});
