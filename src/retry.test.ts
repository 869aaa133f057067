// Unit tests for retry with backoff and per-call deadlines

import { describe, it, expect, vi, afterEach } from "vitest";
import { hasErrorKind, PipelineError } from "./errors.js";
import { DeadlineExceededError, backoffDelay, withDeadline, withRetry } from "./retry.js";

describe("backoffDelay", () => {
  it("doubles from the base delay and caps at the maximum", () => {
    expect(backoffDelay(1, 50)).toBe(50);
    expect(backoffDelay(2, 50)).toBe(100);
    expect(backoffDelay(3, 50)).toBe(200);
    expect(backoffDelay(10, 50)).toBe(2000);
    expect(backoffDelay(3, 50, 120)).toBe(120);
  });
});

describe("withRetry", () => {
  const transient = new PipelineError("StorageUnavailable", "blip");

  it("returns the first successful result", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn().mockRejectedValueOnce(transient).mockResolvedValueOnce("ok");

    const result = await withRetry(fn, {
      attempts: 3,
      baseDelayMs: 10,
      shouldRetry: () => true,
      sleep,
    });

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it("gives up after the configured attempts with the last error", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const onRetry = vi.fn();
    const fn = vi.fn().mockRejectedValue(transient);

    await expect(
      withRetry(fn, { attempts: 3, baseDelayMs: 10, shouldRetry: () => true, onRetry, sleep }),
    ).rejects.toBe(transient);

    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [20]]);
    expect(onRetry).toHaveBeenNthCalledWith(1, transient, 1, 10);
    expect(onRetry).toHaveBeenNthCalledWith(2, transient, 2, 20);
  });

  it("does not retry errors the predicate rejects", async () => {
    const fatal = new PipelineError("Internal", "corrupt");
    const fn = vi.fn().mockRejectedValue(fatal);

    await expect(
      withRetry(fn, {
        attempts: 5,
        baseDelayMs: 10,
        shouldRetry: (err) => hasErrorKind(err, "StorageUnavailable"),
        sleep: async () => {},
      }),
    ).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe("withDeadline", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the value when the work finishes in time", async () => {
    await expect(withDeadline("lookup", 1000, async () => 42)).resolves.toBe(42);
  });

  it("rejects with DeadlineExceededError and aborts the work signal on expiry", async () => {
    vi.useFakeTimers();
    let seen: AbortSignal | undefined;
    const pending = withDeadline("transcription", 500, (signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    });
    const assertion = expect(pending).rejects.toThrow("transcription exceeded its 500ms deadline");

    await vi.advanceTimersByTimeAsync(500);
    await assertion;
    await expect(pending).rejects.toBeInstanceOf(DeadlineExceededError);
    expect(seen?.aborted).toBe(true);
  });

  it("rejects with Cancelled when the parent signal aborts", async () => {
    const parent = new AbortController();
    const pending = withDeadline("scoring", 10_000, () => new Promise<never>(() => {}), parent.signal);

    parent.abort();

    const err: unknown = await pending.catch((e: unknown) => e);
    expect(hasErrorKind(err, "Cancelled")).toBe(true);
    expect(err instanceof PipelineError ? err.reason : "").toBe("scoring was cancelled");
  });

  it("does not start the work when the parent is already aborted", async () => {
    const parent = new AbortController();
    parent.abort();
    const fn = vi.fn(async () => "never");

    const err: unknown = await withDeadline("scoring", 1000, fn, parent.signal).catch((e: unknown) => e);

    expect(hasErrorKind(err, "Cancelled")).toBe(true);
    expect(fn).not.toHaveBeenCalled();
  });

  it("passes the work's own rejection through", async () => {
    const boom = new Error("boom");
    await expect(withDeadline("call", 1000, async () => Promise.reject(boom))).rejects.toBe(boom);
  });
});
