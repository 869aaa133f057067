// Exponential backoff for transient storage faults and per-call deadlines for
// provider calls. Timers are always cleared so nothing outlives the call.

import { PipelineError } from "./errors.js";

export interface RetryOptions {
  /** Total attempts including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Delay before retry number `attempt` (1-based): base * 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs = 2000): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      if (attempt === attempts || !options.shouldRetry(err)) {
        throw err;
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(err, attempt, delay);
      await wait(delay);
    }
  }

  // Unreachable: the loop either returns or throws on the last attempt.
  throw lastError;
}

export class DeadlineExceededError extends Error {
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} exceeded its ${timeoutMs}ms deadline`);
    this.name = "DeadlineExceededError";
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Runs `fn` with its own AbortSignal that fires after `timeoutMs` or when the
 * parent signal aborts. Rejects with DeadlineExceededError on expiry and with
 * a Cancelled PipelineError when the parent aborted first.
 */
export function withDeadline<T>(
  label: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new PipelineError("Cancelled", `${label} was cancelled before it started`));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      settle();
    };

    const onParentAbort = (): void => {
      controller.abort();
      finish(() => reject(new PipelineError("Cancelled", `${label} was cancelled`)));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new DeadlineExceededError(label, timeoutMs)));
    }, timeoutMs);

    parent?.addEventListener("abort", onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}
