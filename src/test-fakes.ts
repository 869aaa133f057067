// In-process stand-ins for the external capabilities, shared by the tests.
// None of these open a socket or touch the network.

import type { z } from "zod";
import type { AnalysisCallOptions, AnalysisGateway, AnalysisPrompt } from "./analysis-gateway.js";
import { parseStructuredReply } from "./analysis-gateway.js";
import type { KeyValueBackend } from "./tenant-store.js";
import { MemoryBackend } from "./tenant-store.js";
import type { TranscriptionChannel, TranscriptionGateway } from "./transcription-engine.js";
import type { TranscriptSegment } from "./types.js";

// ─── Embeddings ─────────────────────────────────────────────────────────────────

export const HASH_DIMENSIONS = 64;

/** Bag-of-words vector: each lowercase token adds 1 to a hashed bucket. */
export function hashEmbedding(text: string, dimensions = HASH_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    let hash = 0;
    for (let i = 0; i < token.length; i++) {
      hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
    }
    vector[hash % dimensions] += 1;
  }
  return vector;
}

/** Resolves after `ms`, or rejects when the signal aborts first. */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error("aborted"));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ─── Analysis ───────────────────────────────────────────────────────────────────

export type ScriptedReply = string | Error;

export interface ScriptedAnalysisOptions {
  /** Raw completion texts, consumed in order; the last one repeats. */
  replies?: ScriptedReply[];
  /** Delay before each completion settles; aborting the call cuts it short. */
  completionDelayMs?: number;
  embedError?: Error;
}

/**
 * Returns scripted raw replies through the same parsing and validation the
 * OpenAI gateway uses, and hashes text for embeddings.
 */
export class ScriptedAnalysisGateway implements AnalysisGateway {
  readonly prompts: AnalysisPrompt[] = [];
  readonly embedded: string[] = [];
  private readonly replies: ScriptedReply[];
  private readonly completionDelayMs: number;
  private readonly embedError: Error | undefined;

  constructor(options: ScriptedAnalysisOptions = {}) {
    this.replies = [...(options.replies ?? [])];
    this.completionDelayMs = options.completionDelayMs ?? 0;
    this.embedError = options.embedError;
  }

  async complete<T>(
    prompt: AnalysisPrompt,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: AnalysisCallOptions = {},
  ): Promise<T> {
    this.prompts.push(prompt);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (this.completionDelayMs > 0) {
      await abortableDelay(this.completionDelayMs, options.signal);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return parseStructuredReply(reply, schema);
  }

  async embed(text: string): Promise<number[]> {
    if (this.embedError) {
      throw this.embedError;
    }
    this.embedded.push(text);
    return hashEmbedding(text);
  }
}

// ─── Transcription ──────────────────────────────────────────────────────────────

export class FakeChannel implements TranscriptionChannel {
  readonly audio: Buffer[] = [];
  closed = false;
  qualityWarning = false;

  constructor(
    readonly id: string,
    private readonly onSegment: (segment: TranscriptSegment) => void,
  ) {}

  sendAudio(chunk: Buffer): void {
    this.audio.push(Buffer.from(chunk));
  }

  close(): void {
    this.closed = true;
  }

  /** Delivers a segment as if the live provider had produced it. */
  emit(segment: TranscriptSegment): void {
    this.onSegment(segment);
  }
}

export type FinalizeBehaviour =
  | { kind: "segments"; segments: TranscriptSegment[] }
  | { kind: "error"; error: Error }
  /** Never settles on its own; only the caller's deadline ends it. */
  | { kind: "hang" };

export class FakeTranscriptionGateway implements TranscriptionGateway {
  readonly channels: FakeChannel[] = [];
  readonly finalized: Buffer[] = [];
  openError: Error | null = null;
  finalizeBehaviour: FinalizeBehaviour = { kind: "segments", segments: [] };

  async openChannel(onSegment: (segment: TranscriptSegment) => void): Promise<TranscriptionChannel> {
    if (this.openError) {
      throw this.openError;
    }
    const channel = new FakeChannel(`channel-${this.channels.length + 1}`, onSegment);
    this.channels.push(channel);
    return channel;
  }

  async finalize(audio: Buffer, signal?: AbortSignal): Promise<TranscriptSegment[]> {
    this.finalized.push(Buffer.from(audio));
    const behaviour = this.finalizeBehaviour;
    switch (behaviour.kind) {
      case "segments":
        return behaviour.segments;
      case "error":
        throw behaviour.error;
      case "hang":
        return new Promise((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
    }
  }

  get lastChannel(): FakeChannel {
    const channel = this.channels[this.channels.length - 1];
    if (!channel) {
      throw new Error("No channel has been opened");
    }
    return channel;
  }
}

// ─── Storage ────────────────────────────────────────────────────────────────────

/**
 * Wraps a MemoryBackend and throws for the next `failures` calls, to exercise
 * the store's retry path.
 */
export class FlakyBackend implements KeyValueBackend {
  readonly inner: MemoryBackend;
  calls = 0;
  private failures: number;

  constructor(failures: number, inner: MemoryBackend = new MemoryBackend()) {
    this.failures = failures;
    this.inner = inner;
  }

  failNext(count: number): void {
    this.failures = count;
  }

  private trip(): void {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error("connection reset");
    }
  }

  async get(key: string): Promise<string | null> {
    this.trip();
    return this.inner.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.trip();
    return this.inner.set(key, value, ttlSeconds);
  }

  async del(key: string): Promise<void> {
    this.trip();
    return this.inner.del(key);
  }

  async keys(prefix: string): Promise<string[]> {
    this.trip();
    return this.inner.keys(prefix);
  }
}
