// In-flight work keyed by string. At most one run per key at a time; a second
// caller either joins the running promise or is rejected.
//
// The run gets its own AbortSignal. A caller's signal only detaches that
// caller; the run itself is aborted once every attached caller has gone.

import { PipelineError } from "./errors.js";

export type ConcurrencyPolicy = "join" | "reject";

export interface RunOptions {
  /** Cancels this caller's wait. */
  signal?: AbortSignal;
  /** Names the work in AlreadyScoring and Cancelled reasons. */
  label?: string;
}

interface Flight<T> {
  promise: Promise<T>;
  controller: AbortController;
  callers: number;
  detached: number;
}

export class KeyedInFlight<T> {
  private readonly running = new Map<string, Flight<T>>();

  constructor(private readonly policy: ConcurrencyPolicy = "join") {}

  has(key: string): boolean {
    return this.running.has(key);
  }

  get size(): number {
    return this.running.size;
  }

  /**
   * Runs `fn` unless a run for `key` is already in flight. The key is released
   * when the run settles, whether it resolved or rejected.
   *
   * @throws PipelineError AlreadyScoring under the "reject" policy, Cancelled
   *   when the caller's own signal aborts first.
   */
  run(key: string, fn: (signal: AbortSignal) => Promise<T>, options: RunOptions = {}): Promise<T> {
    const label = options.label ?? key;
    if (options.signal?.aborted) {
      return Promise.reject(new PipelineError("Cancelled", "Scoring was cancelled"));
    }

    // A run whose callers all left is winding down; start afresh beside it.
    const existing = this.running.get(key);
    const live = existing && !existing.controller.signal.aborted ? existing : undefined;
    if (live && this.policy === "reject") {
      return Promise.reject(new PipelineError("AlreadyScoring", `Scoring already in progress for ${label}`));
    }
    return this.attach(live ?? this.start(key, fn), options.signal, label);
  }

  private start(key: string, fn: (signal: AbortSignal) => Promise<T>): Flight<T> {
    const controller = new AbortController();
    const flight: Flight<T> = {
      promise: Promise.resolve()
        .then(() => fn(controller.signal))
        .finally(() => {
          if (this.running.get(key) === flight) {
            this.running.delete(key);
          }
        }),
      controller,
      callers: 0,
      detached: 0,
    };
    this.running.set(key, flight);
    return flight;
  }

  private attach(flight: Flight<T>, signal: AbortSignal | undefined, label: string): Promise<T> {
    flight.callers++;
    if (!signal) {
      return flight.promise;
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        flight.detached++;
        if (flight.detached === flight.callers) {
          flight.controller.abort();
        }
        reject(new PipelineError("Cancelled", `Scoring was cancelled for ${label}`));
      };
      signal.addEventListener("abort", onAbort, { once: true });

      // Settling after the caller detached is a no-op; the handler still
      // observes the run's outcome.
      flight.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }
}
