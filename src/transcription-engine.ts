// Pitch Scoring Pipeline - Transcription Gateway
// Two passes over the same recording:
//   1. Deepgram live captions while the team is presenting (streamed segments)
//   2. OpenAI batch transcription after the pitch (canonical transcript)
//
// A channel never reconnects. Connection errors and unexpected drops set
// qualityWarning; segments already emitted stay with the caller.

import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { TranscriptSegment } from "./types.js";

// ─── Gateway contract ───────────────────────────────────────────────────────────

export interface TranscriptionChannel {
  readonly id: string;
  readonly qualityWarning: boolean;
  sendAudio(chunk: Buffer): void;
  /** Idempotent. */
  close(): void;
}

export interface TranscriptionGateway {
  openChannel(onSegment: (segment: TranscriptSegment) => void): Promise<TranscriptionChannel>;
  /** Batch pass over the full recording. Returned segments are ordered and final. */
  finalize(audio: Buffer, signal?: AbortSignal): Promise<TranscriptSegment[]>;
}

// ─── Provider client surfaces (injected, so tests can pass plain objects) ────────

export interface LiveConnection {
  on(event: string, listener: (payload: unknown) => void): unknown;
  send(data: ArrayBuffer): void;
  requestClose(): void;
}

export interface DeepgramLiveClient {
  listen: {
    live(options: LiveSchema): LiveConnection;
  };
}

export interface OpenAITranscriptionRequest {
  file: File;
  model: string;
  language?: string;
  response_format: "json" | "verbose_json";
  timestamp_granularities?: Array<"word" | "segment">;
}

/**
 * `segments`, `words` and `duration` only come back with verbose_json
 * (whisper-1). gpt-4o-transcribe returns text only.
 */
export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number | string;
  segments?: Array<{ start: number; end: number; text: string }>;
  words?: Array<{ word: string; start: number; end: number }>;
}

export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(
        params: OpenAITranscriptionRequest,
        options?: { signal?: AbortSignal },
      ): Promise<OpenAITranscriptionResponse>;
    };
  };
}

/** Mono LINEAR16 at 16 kHz, matching what the audio socket accepts. */
export const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  language: "en",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  interim_results: true,
  punctuate: true,
  smart_format: true,
};

const DeepgramTranscriptEventSchema = z.object({
  start: z.number(),
  duration: z.number(),
  is_final: z.boolean().optional(),
  channel: z.object({
    alternatives: z.array(
      z.object({
        transcript: z.string(),
        confidence: z.number().optional(),
      }),
    ),
  }),
});

// ─── Deepgram + OpenAI implementation ───────────────────────────────────────────

export interface DeepgramTranscriptionGatewayOptions {
  deepgram: DeepgramLiveClient;
  openai: OpenAITranscriptionClient;
  model?: string;
  liveConfig?: Partial<LiveSchema>;
  logger?: Logger;
}

class DeepgramChannel implements TranscriptionChannel {
  readonly id = uuidv4();
  private connection: LiveConnection | null;
  private _qualityWarning = false;

  constructor(
    connection: LiveConnection,
    private readonly onSegment: (segment: TranscriptSegment) => void,
    private readonly logger: Logger,
  ) {
    this.connection = connection;

    connection.on(LiveTranscriptionEvents.Transcript, (payload) => this.handleTranscript(payload));

    connection.on(LiveTranscriptionEvents.Error, (payload) => {
      this._qualityWarning = true;
      this.logger.warn("Live transcription error", { channelId: this.id, error: String(payload) });
    });

    connection.on(LiveTranscriptionEvents.Close, () => {
      // Still holding the connection means we did not ask for the close
      if (this.connection) {
        this._qualityWarning = true;
        this.connection = null;
        this.logger.warn("Live transcription connection dropped", { channelId: this.id });
      }
    });
  }

  get qualityWarning(): boolean {
    return this._qualityWarning;
  }

  sendAudio(chunk: Buffer): void {
    if (!this.connection) {
      return;
    }
    const copy = new Uint8Array(chunk.byteLength);
    copy.set(chunk);
    this.connection.send(copy.buffer);
  }

  close(): void {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    try {
      connection.requestClose();
    } catch (err) {
      this.logger.debug("Close request on a dead connection", { channelId: this.id, error: String(err) });
    }
  }

  private handleTranscript(payload: unknown): void {
    const parsed = DeepgramTranscriptEventSchema.safeParse(payload);
    if (!parsed.success) {
      this.logger.warn("Ignoring malformed live transcript event", { channelId: this.id });
      return;
    }
    const event = parsed.data;
    const alternative = event.channel.alternatives[0];
    // Silence arrives as an empty transcript
    if (!alternative || alternative.transcript.trim().length === 0) {
      return;
    }

    this.onSegment({
      text: alternative.transcript.trim(),
      startOffset: Math.max(0, event.start),
      endOffset: Math.max(0, event.start + event.duration),
      confidence: clampConfidence(alternative.confidence ?? 1),
      isFinal: event.is_final === true,
    });
  }
}

export class DeepgramTranscriptionGateway implements TranscriptionGateway {
  private readonly deepgram: DeepgramLiveClient;
  private readonly openai: OpenAITranscriptionClient;
  private readonly model: string;
  private readonly liveConfig: LiveSchema;
  private readonly logger: Logger;

  constructor(options: DeepgramTranscriptionGatewayOptions) {
    this.deepgram = options.deepgram;
    this.openai = options.openai;
    this.model = options.model ?? "gpt-4o-transcribe";
    this.liveConfig = { ...DEFAULT_LIVE_CONFIG, ...options.liveConfig };
    this.logger = options.logger ?? silentLogger;
  }

  async openChannel(onSegment: (segment: TranscriptSegment) => void): Promise<TranscriptionChannel> {
    const connection = this.deepgram.listen.live(this.liveConfig);
    const channel = new DeepgramChannel(connection, onSegment, this.logger);
    this.logger.info("Opened live transcription channel", { channelId: channel.id, model: String(this.liveConfig.model) });
    return channel;
  }

  async finalize(audio: Buffer, signal?: AbortSignal): Promise<TranscriptSegment[]> {
    if (audio.length === 0) {
      return [];
    }

    const wav = isWav(audio) ? audio : encodeWav(audio, this.sampleRate());
    const file = new File([new Uint8Array(wav)], "pitch.wav", { type: "audio/wav" });

    // whisper-1 is the only model that returns timestamps (verbose_json)
    const verbose = this.model === "whisper-1";
    const response = await this.openai.audio.transcriptions.create(
      verbose
        ? {
            file,
            model: this.model,
            language: "en",
            response_format: "verbose_json",
            timestamp_granularities: ["word", "segment"],
          }
        : { file, model: this.model, language: "en", response_format: "json" },
      { signal },
    );

    return parseTranscriptionResponse(response);
  }

  private sampleRate(): number {
    const rate = this.liveConfig.sample_rate;
    return typeof rate === "number" && rate > 0 ? rate : WAV_SAMPLE_RATE;
  }
}

// ─── WAV framing ────────────────────────────────────────────────────────────────

export const WAV_SAMPLE_RATE = 16000;
export const WAV_HEADER_BYTES = 44;

export function isWav(audio: Buffer): boolean {
  return (
    audio.length >= WAV_HEADER_BYTES &&
    audio.toString("ascii", 0, 4) === "RIFF" &&
    audio.toString("ascii", 8, 12) === "WAVE"
  );
}

/** Prefixes mono 16-bit LINEAR16 PCM with a canonical 44-byte RIFF/WAVE header. */
export function encodeWav(pcm: Buffer, sampleRate = WAV_SAMPLE_RATE): Buffer {
  const channels = 1;
  const bitsPerSample = 16;
  const blockAlign = (channels * bitsPerSample) / 8;
  const header = Buffer.alloc(WAV_HEADER_BYTES);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20); // PCM
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
}

// ─── Response normalisation ─────────────────────────────────────────────────────

/**
 * Normalises a batch transcription into ordered final segments. Segment
 * timestamps win over word timestamps; text-only responses become a single
 * segment spanning the reported duration (0 when unknown).
 */
export function parseTranscriptionResponse(response: OpenAITranscriptionResponse): TranscriptSegment[] {
  const text = response.text.trim();
  if (!text) {
    return [];
  }

  if (response.segments && response.segments.length > 0) {
    return response.segments
      .filter((seg) => seg.text.trim().length > 0)
      .map((seg) => {
        const startOffset = Math.max(0, seg.start);
        return {
          text: seg.text.trim(),
          startOffset,
          endOffset: Math.max(startOffset, seg.end),
          confidence: 1,
          isFinal: true,
        };
      })
      .sort((a, b) => a.startOffset - b.startOffset);
  }

  if (response.words && response.words.length > 0) {
    const words = response.words;
    const startOffset = Math.max(0, words[0].start);
    return [
      {
        text: words.map((w) => w.word.trim()).join(" "),
        startOffset,
        endOffset: Math.max(startOffset, words[words.length - 1].end),
        confidence: 1,
        isFinal: true,
      },
    ];
  }

  const duration = Number(response.duration ?? 0);
  return [
    {
      text,
      startOffset: 0,
      endOffset: Number.isFinite(duration) && duration > 0 ? duration : 0,
      confidence: 1,
      isFinal: true,
    },
  ];
}

function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
