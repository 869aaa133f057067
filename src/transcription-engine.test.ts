// Unit tests for the Transcription Gateway (Deepgram live + OpenAI batch)

import { describe, it, expect, vi } from "vitest";
import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import type { Logger } from "./logger.js";
import {
  DEFAULT_LIVE_CONFIG,
  DeepgramTranscriptionGateway,
  encodeWav,
  parseTranscriptionResponse,
} from "./transcription-engine.js";
import type {
  LiveConnection,
  OpenAITranscriptionClient,
  OpenAITranscriptionRequest,
  OpenAITranscriptionResponse,
} from "./transcription-engine.js";
import type { TranscriptSegment } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function createSilentLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

class MockConnection implements LiveConnection {
  readonly sent: ArrayBuffer[] = [];
  closeRequests = 0;
  private readonly handlers = new Map<string, Array<(payload: unknown) => void>>();

  on(event: string, listener: (payload: unknown) => void): void {
    const list = this.handlers.get(event) ?? [];
    list.push(listener);
    this.handlers.set(event, list);
  }

  send(data: ArrayBuffer): void {
    this.sent.push(data);
  }

  requestClose(): void {
    this.closeRequests++;
  }

  fire(event: string, payload?: unknown): void {
    for (const handler of this.handlers.get(event) ?? []) {
      handler(payload);
    }
  }
}

function transcriptEvent(transcript: string, overrides: Record<string, unknown> = {}): unknown {
  return {
    start: 1.5,
    duration: 2,
    is_final: true,
    channel: { alternatives: [{ transcript, confidence: 0.9 }] },
    ...overrides,
  };
}

function createGateway(options: { model?: string; response?: OpenAITranscriptionResponse; liveConfig?: Partial<LiveSchema> } = {}) {
  const connection = new MockConnection();
  const live = vi.fn((_options: LiveSchema) => connection);
  const create = vi.fn(
    async (_params: OpenAITranscriptionRequest, _options?: { signal?: AbortSignal }) =>
      options.response ?? { text: "hello world" },
  );
  const openai: OpenAITranscriptionClient = { audio: { transcriptions: { create } } };
  const logger = createSilentLogger();
  const gateway = new DeepgramTranscriptionGateway({
    deepgram: { listen: { live } },
    openai,
    model: options.model,
    liveConfig: options.liveConfig,
    logger,
  });
  return { gateway, connection, live, create, logger };
}

async function openWithSink(gateway: DeepgramTranscriptionGateway) {
  const segments: TranscriptSegment[] = [];
  const channel = await gateway.openChannel((segment) => segments.push(segment));
  return { channel, segments };
}

// ─── Live channel ─────────────────────────────────────────────────────────────

describe("DeepgramTranscriptionGateway live channel", () => {
  it("opens a live connection with the default config plus overrides", async () => {
    const { gateway, live } = createGateway({ liveConfig: { model: "nova-3" } });

    await gateway.openChannel(() => {});

    expect(live).toHaveBeenCalledWith({ ...DEFAULT_LIVE_CONFIG, model: "nova-3" });
  });

  it("turns transcript events into segments", async () => {
    const { gateway, connection } = createGateway();
    const { segments } = await openWithSink(gateway);

    connection.fire(LiveTranscriptionEvents.Transcript, transcriptEvent("  We built an agent.  "));
    connection.fire(LiveTranscriptionEvents.Transcript, transcriptEvent("We built", { is_final: false }));

    expect(segments).toEqual([
      { text: "We built an agent.", startOffset: 1.5, endOffset: 3.5, confidence: 0.9, isFinal: true },
      { text: "We built", startOffset: 1.5, endOffset: 3.5, confidence: 0.9, isFinal: false },
    ]);
  });

  it("skips silence and malformed events", async () => {
    const { gateway, connection, logger } = createGateway();
    const { segments } = await openWithSink(gateway);

    connection.fire(LiveTranscriptionEvents.Transcript, transcriptEvent("   "));
    connection.fire(LiveTranscriptionEvents.Transcript, { start: "soon" });

    expect(segments).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("clamps confidence and defaults it to 1", async () => {
    const { gateway, connection } = createGateway();
    const { segments } = await openWithSink(gateway);

    connection.fire(
      LiveTranscriptionEvents.Transcript,
      transcriptEvent("loud", { channel: { alternatives: [{ transcript: "loud", confidence: 1.7 }] } }),
    );
    connection.fire(
      LiveTranscriptionEvents.Transcript,
      transcriptEvent("quiet", { channel: { alternatives: [{ transcript: "quiet" }] } }),
    );

    expect(segments.map((segment) => segment.confidence)).toEqual([1, 1]);
  });

  it("forwards a copy of each audio chunk", async () => {
    const { gateway, connection } = createGateway();
    const { channel } = await openWithSink(gateway);
    const chunk = Buffer.from([1, 2, 3, 4]);

    channel.sendAudio(chunk);
    chunk[0] = 9;

    expect(connection.sent).toHaveLength(1);
    expect([...new Uint8Array(connection.sent[0])]).toEqual([1, 2, 3, 4]);
  });

  it("closes once and ignores audio afterwards", async () => {
    const { gateway, connection } = createGateway();
    const { channel } = await openWithSink(gateway);

    channel.close();
    channel.close();
    connection.fire(LiveTranscriptionEvents.Close);
    channel.sendAudio(Buffer.from([1, 2]));

    expect(connection.closeRequests).toBe(1);
    expect(connection.sent).toEqual([]);
    expect(channel.qualityWarning).toBe(false);
  });

  it("flags a quality warning on a provider error", async () => {
    const { gateway, connection } = createGateway();
    const { channel } = await openWithSink(gateway);

    connection.fire(LiveTranscriptionEvents.Error, new Error("socket hang up"));

    expect(channel.qualityWarning).toBe(true);
  });

  it("flags a quality warning when the connection drops unasked and keeps earlier segments", async () => {
    const { gateway, connection } = createGateway();
    const { channel, segments } = await openWithSink(gateway);

    connection.fire(LiveTranscriptionEvents.Transcript, transcriptEvent("Before the drop."));
    connection.fire(LiveTranscriptionEvents.Close);
    channel.sendAudio(Buffer.from([1, 2]));

    expect(channel.qualityWarning).toBe(true);
    expect(segments).toHaveLength(1);
    expect(connection.sent).toEqual([]);
  });
});

// ─── Batch finalization ───────────────────────────────────────────────────────

describe("DeepgramTranscriptionGateway.finalize", () => {
  it("returns nothing for empty audio without calling the provider", async () => {
    const { gateway, create } = createGateway();

    await expect(gateway.finalize(Buffer.alloc(0))).resolves.toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it("requests plain JSON from gpt-4o-transcribe and passes the signal", async () => {
    const { gateway, create } = createGateway({ response: { text: "Our agent books travel.", duration: 4 } });
    const controller = new AbortController();

    const segments = await gateway.finalize(Buffer.from([0, 1, 0, 1]), controller.signal);

    expect(segments).toEqual([
      { text: "Our agent books travel.", startOffset: 0, endOffset: 4, confidence: 1, isFinal: true },
    ]);
    const [params, options] = create.mock.calls[0];
    expect(params.model).toBe("gpt-4o-transcribe");
    expect(params.response_format).toBe("json");
    expect(params.timestamp_granularities).toBeUndefined();
    expect(params.file.name).toBe("pitch.wav");
    expect(options?.signal).toBe(controller.signal);
  });

  it("requests timestamps from whisper-1", async () => {
    const { gateway, create } = createGateway({
      model: "whisper-1",
      response: { text: "hi", segments: [{ start: 0, end: 0.5, text: "hi" }] },
    });

    await gateway.finalize(Buffer.from([0, 1]));

    const [params] = create.mock.calls[0];
    expect(params.response_format).toBe("verbose_json");
    expect(params.timestamp_granularities).toEqual(["word", "segment"]);
  });

  it("propagates provider failures", async () => {
    const { gateway, create } = createGateway();
    create.mockRejectedValueOnce(new Error("503 from provider"));

    await expect(gateway.finalize(Buffer.from([0, 1]))).rejects.toThrow("503 from provider");
  });

  it("wraps raw PCM in a 16 kHz mono WAV header before upload", async () => {
    const { gateway, create } = createGateway();

    await gateway.finalize(Buffer.from([1, 2, 3, 4]));

    const [params] = create.mock.calls[0];
    const bytes = Buffer.from(await params.file.arrayBuffer());
    expect(bytes.length).toBe(48);
    expect(bytes.toString("ascii", 0, 4)).toBe("RIFF");
    expect(bytes.readUInt32LE(4)).toBe(40);
    expect(bytes.toString("ascii", 8, 12)).toBe("WAVE");
    expect(bytes.readUInt16LE(22)).toBe(1);
    expect(bytes.readUInt32LE(24)).toBe(16000);
    expect(bytes.readUInt16LE(34)).toBe(16);
    expect(bytes.readUInt32LE(40)).toBe(4);
    expect([...bytes.subarray(44)]).toEqual([1, 2, 3, 4]);
  });

  it("uploads audio that is already WAV unchanged", async () => {
    const { gateway, create } = createGateway();
    const wav = encodeWav(Buffer.from([5, 6]));

    await gateway.finalize(wav);

    const [params] = create.mock.calls[0];
    expect(Buffer.from(await params.file.arrayBuffer())).toEqual(wav);
  });
});

// ─── Response normalisation ───────────────────────────────────────────────────

describe("parseTranscriptionResponse", () => {
  it("orders segments by start time and drops empty ones", () => {
    expect(
      parseTranscriptionResponse({
        text: "second first",
        segments: [
          { start: 2, end: 3, text: " second " },
          { start: 1, end: 1, text: "  " },
          { start: 0, end: 1.5, text: "first" },
        ],
      }),
    ).toEqual([
      { text: "first", startOffset: 0, endOffset: 1.5, confidence: 1, isFinal: true },
      { text: "second", startOffset: 2, endOffset: 3, confidence: 1, isFinal: true },
    ]);
  });

  it("falls back to word timestamps as one segment", () => {
    expect(
      parseTranscriptionResponse({
        text: "ship it",
        words: [
          { word: "ship", start: 0.2, end: 0.5 },
          { word: "it", start: 0.6, end: 0.8 },
        ],
      }),
    ).toEqual([{ text: "ship it", startOffset: 0.2, endOffset: 0.8, confidence: 1, isFinal: true }]);
  });

  it("uses the reported duration for text-only responses", () => {
    expect(parseTranscriptionResponse({ text: "hello", duration: "12.5" })).toEqual([
      { text: "hello", startOffset: 0, endOffset: 12.5, confidence: 1, isFinal: true },
    ]);
    expect(parseTranscriptionResponse({ text: "hello" })).toEqual([
      { text: "hello", startOffset: 0, endOffset: 0, confidence: 1, isFinal: true },
    ]);
  });

  it("returns nothing for an empty transcript", () => {
    expect(parseTranscriptionResponse({ text: "   " })).toEqual([]);
  });
});
