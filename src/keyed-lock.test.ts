// Unit tests for KeyedInFlight

import { describe, it, expect } from "vitest";
import { PipelineError } from "./errors.js";
import { KeyedInFlight } from "./keyed-lock.js";
import { createDeferred } from "./utils/deferred.js";

describe("KeyedInFlight", () => {
  it("shares one run between concurrent callers under join", async () => {
    const lock = new KeyedInFlight<number>("join");
    const gate = createDeferred<number>();
    let calls = 0;
    const fn = () => {
      calls++;
      return gate.promise;
    };

    const first = lock.run("s1", fn);
    const second = lock.run("s1", fn);
    gate.resolve(7);

    await expect(Promise.all([first, second])).resolves.toEqual([7, 7]);
    expect(calls).toBe(1);
  });

  it("rejects a second caller under reject", async () => {
    const lock = new KeyedInFlight<number>("reject");
    const gate = createDeferred<number>();

    const first = lock.run("s1", () => gate.promise);
    const err: unknown = await lock.run("s1", () => Promise.resolve(1), { label: "session s1" }).catch((e: unknown) => e);
    gate.resolve(3);

    expect(err instanceof PipelineError && err.toPublic()).toEqual({
      kind: "AlreadyScoring",
      reason: "Scoring already in progress for session s1",
    });
    await expect(first).resolves.toBe(3);
  });

  it("runs different keys independently", async () => {
    const lock = new KeyedInFlight<string>("reject");

    await expect(Promise.all([lock.run("a", async () => "a"), lock.run("b", async () => "b")])).resolves.toEqual([
      "a",
      "b",
    ]);
  });

  it("releases the key after a failure", async () => {
    const lock = new KeyedInFlight<number>("reject");

    await expect(lock.run("s1", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");

    expect(lock.has("s1")).toBe(false);
    expect(lock.size).toBe(0);
    await expect(lock.run("s1", async () => 2)).resolves.toBe(2);
  });

  it("turns a synchronous throw into a rejection", async () => {
    const lock = new KeyedInFlight<number>();

    await expect(
      lock.run("s1", () => {
        throw new Error("sync");
      }),
    ).rejects.toThrow("sync");
    expect(lock.has("s1")).toBe(false);
  });

  // ─── Cancellation ─────────────────────────────────────────────────────────────

  it("lets a joined caller finish when the first caller cancels", async () => {
    const lock = new KeyedInFlight<number>("join");
    const gate = createDeferred<number>();
    let runSignal: AbortSignal | undefined;
    const fn = (signal: AbortSignal) => {
      runSignal = signal;
      return gate.promise;
    };
    const controller = new AbortController();

    const first = lock.run("s1", fn, { signal: controller.signal, label: "session s1" });
    const second = lock.run("s1", fn);
    await Promise.resolve();
    controller.abort();
    gate.resolve(7);

    await expect(first).rejects.toThrow("Cancelled: Scoring was cancelled for session s1");
    await expect(second).resolves.toBe(7);
    expect(runSignal?.aborted).toBe(false);
  });

  it("aborts the run once every caller has cancelled", async () => {
    const lock = new KeyedInFlight<number>("join");
    const gate = createDeferred<number>();
    let runSignal: AbortSignal | undefined;
    const fn = (signal: AbortSignal) => {
      runSignal = signal;
      return gate.promise;
    };
    const a = new AbortController();
    const b = new AbortController();

    const first = lock.run("s1", fn, { signal: a.signal });
    const second = lock.run("s1", fn, { signal: b.signal });
    await Promise.resolve();

    a.abort();
    expect(runSignal?.aborted).toBe(false);
    b.abort();
    expect(runSignal?.aborted).toBe(true);

    gate.reject(new Error("stopped"));
    await expect(first).rejects.toThrow("Cancelled");
    await expect(second).rejects.toThrow("Cancelled");
  });

  it("refuses a caller whose signal is already aborted", async () => {
    const lock = new KeyedInFlight<number>();
    const controller = new AbortController();
    controller.abort();
    let calls = 0;

    await expect(
      lock.run(
        "s1",
        async () => {
          calls++;
          return 1;
        },
        { signal: controller.signal },
      ),
    ).rejects.toThrow("Cancelled: Scoring was cancelled");
    expect(calls).toBe(0);
    expect(lock.has("s1")).toBe(false);
  });
});
