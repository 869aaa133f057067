// Pitch Scoring Pipeline - Session Manager
// Owns the recording session lifecycle:
//   initializing → ready_to_record → recording → processing → completed
// with error reachable from every non-terminal state.
//
// Sessions are persisted through the Tenant Store on every transition, so a
// poller reading between `complete()` steps sees "processing". Mutations of
// one session run through a per-session queue and never interleave; reads do
// not queue.
//
// Audio chunks are buffered in memory until completion, then written to the
// Blob Store before the session is pointed at them.

import { v4 as uuidv4 } from "uuid";
import type { BlobStore } from "./blob-store.js";
import { PipelineError, errorMessage, hasErrorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { withDeadline } from "./retry.js";
import { TranscriptSegmentSchema } from "./schemas.js";
import { Keys } from "./tenant-store.js";
import type { TenantStore } from "./tenant-store.js";
import type { TranscriptionChannel, TranscriptionGateway } from "./transcription-engine.js";
import { SessionStatus } from "./types.js";
import type { BlobHandle, Session, Transcript, TranscriptSegment } from "./types.js";

// ─── State machine ──────────────────────────────────────────────────────────────

const VALID_TRANSITIONS: ReadonlyMap<SessionStatus, ReadonlySet<SessionStatus>> = new Map([
  [SessionStatus.INITIALIZING, new Set([SessionStatus.READY_TO_RECORD, SessionStatus.ERROR])],
  [SessionStatus.READY_TO_RECORD, new Set([SessionStatus.RECORDING, SessionStatus.ERROR])],
  [SessionStatus.RECORDING, new Set([SessionStatus.PROCESSING, SessionStatus.ERROR])],
  [SessionStatus.PROCESSING, new Set([SessionStatus.COMPLETED, SessionStatus.ERROR])],
  [SessionStatus.COMPLETED, new Set<SessionStatus>()],
  [SessionStatus.ERROR, new Set<SessionStatus>()],
]);

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return VALID_TRANSITIONS.get(from)?.has(to) ?? false;
}

function assertTransition(session: Session, to: SessionStatus, operation: string): void {
  if (!canTransition(session.status, to)) {
    throw new PipelineError(
      "InvalidTransition",
      `Cannot call ${operation}() on session ${session.id} in "${session.status}" state`,
    );
  }
}

/**
 * Joins final segment texts with single spaces. A transcript with no final
 * segment falls back to its interim texts.
 */
export function buildTranscript(segments: TranscriptSegment[]): Transcript {
  const finals = segments.filter((segment) => segment.isFinal);
  const source = finals.length > 0 ? finals : segments;
  const totalText = source
    .map((segment) => segment.text.trim())
    .filter((text) => text.length > 0)
    .join(" ");
  return { segments: [...segments], totalText };
}

// ─── Options ────────────────────────────────────────────────────────────────────

export type CompletionListener = (session: Session) => void | Promise<void>;

export type SegmentListener = (segment: TranscriptSegment) => void;

export interface SessionManagerOptions {
  store: TenantStore;
  blobs: BlobStore;
  transcription: TranscriptionGateway;
  /** Ceiling for transcript finalization during complete(). */
  transcriptionTimeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

/** Content type recorded for buffered live audio. */
export const LIVE_AUDIO_CONTENT_TYPE = "audio/L16; rate=16000; channels=1";

// ─── Session Manager ────────────────────────────────────────────────────────────

export class SessionManager {
  private readonly store: TenantStore;
  private readonly blobs: BlobStore;
  private readonly transcription: TranscriptionGateway;
  private readonly transcriptionTimeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly queues = new Map<string, Promise<void>>();
  private readonly channels = new Map<string, TranscriptionChannel>();
  private readonly audioChunks = new Map<string, Buffer[]>();
  private readonly segmentListeners = new Map<string, Set<SegmentListener>>();
  private readonly completionListeners: CompletionListener[] = [];

  constructor(options: SessionManagerOptions) {
    this.store = options.store;
    this.blobs = options.blobs;
    this.transcription = options.transcription;
    this.transcriptionTimeoutMs = options.transcriptionTimeoutMs ?? 30_000;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Registers a listener run after every successful completion. */
  onCompleted(listener: CompletionListener): void {
    this.completionListeners.push(listener);
  }

  /** Live segments (interim and final) for one session. Returns an unsubscribe function. */
  subscribeSegments(tenantId: string, sessionId: string, listener: SegmentListener): () => void {
    const key = sessionKey(tenantId, sessionId);
    let listeners = this.segmentListeners.get(key);
    if (!listeners) {
      listeners = new Set();
      this.segmentListeners.set(key, listeners);
    }
    listeners.add(listener);
    return () => {
      const current = this.segmentListeners.get(key);
      current?.delete(listener);
      if (current?.size === 0) this.segmentListeners.delete(key);
    };
  }

  // ─── Lifecycle operations ─────────────────────────────────────────────────────

  /**
   * Persists a new session, opens its live transcription channel and moves it
   * to ready_to_record. A channel failure leaves the session in error and is
   * not retried; the caller creates a new session.
   */
  async create(tenantId: string, teamName: string, title: string): Promise<Session> {
    if (teamName.trim().length === 0) {
      throw new PipelineError("InvalidInput", "teamName must not be empty");
    }
    if (title.trim().length === 0) {
      throw new PipelineError("InvalidInput", "title must not be empty");
    }

    const timestamp = this.timestamp();
    const session: Session = {
      id: uuidv4(),
      tenantId,
      teamName: teamName.trim(),
      title: title.trim(),
      status: SessionStatus.INITIALIZING,
      createdAt: timestamp,
      updatedAt: timestamp,
      recordingStartedAt: null,
      completedAt: null,
      audioRef: null,
      transcript: null,
      error: null,
      channelId: null,
      scoringTriggeredAt: null,
    };
    await this.store.put(tenantId, Keys.session(session.id), session);

    return this.serialize(tenantId, session.id, async () => {
      let channel: TranscriptionChannel;
      try {
        channel = await this.transcription.openChannel((segment) =>
          this.handleLiveSegment(tenantId, session.id, segment),
        );
      } catch (err) {
        this.logger.error("Failed to open transcription channel", {
          tenantId,
          sessionId: session.id,
          error: errorMessage(err),
        });
        return this.save(session, {
          status: SessionStatus.ERROR,
          error: { reason: `Transcription channel unavailable: ${errorMessage(err)}`, at: this.timestamp() },
        });
      }

      try {
        const ready = await this.save(session, {
          status: SessionStatus.READY_TO_RECORD,
          channelId: channel.id,
        });
        this.channels.set(sessionKey(tenantId, session.id), channel);
        this.logger.info("Session ready to record", { tenantId, sessionId: session.id, teamName: session.teamName });
        return ready;
      } catch (err) {
        channel.close();
        throw err;
      }
    });
  }

  /** ready_to_record → recording. A no-op when already recording. */
  beginRecording(tenantId: string, sessionId: string): Promise<Session> {
    return this.serialize(tenantId, sessionId, async () => {
      const session = await this.getSession(tenantId, sessionId);
      if (session.status === SessionStatus.RECORDING) {
        return session;
      }
      if (session.status !== SessionStatus.READY_TO_RECORD) {
        throw new PipelineError(
          "InvalidTransition",
          `Cannot call beginRecording() on session ${sessionId} in "${session.status}" state`,
        );
      }
      const timestamp = this.timestamp();
      const recording = await this.save(session, {
        status: SessionStatus.RECORDING,
        recordingStartedAt: timestamp,
      });
      this.logger.info("Recording started", { tenantId, sessionId });
      return recording;
    });
  }

  /** Appends one segment in receipt order. Only legal while recording. */
  ingestSegment(tenantId: string, sessionId: string, segment: TranscriptSegment): Promise<Session> {
    const parsed = TranscriptSegmentSchema.safeParse(segment);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return Promise.reject(
        new PipelineError("InvalidInput", `Invalid segment: ${issue.path.join(".") || "segment"} ${issue.message}`),
      );
    }
    const valid = parsed.data;

    return this.serialize(tenantId, sessionId, async () => {
      const session = await this.getSession(tenantId, sessionId);
      if (session.status !== SessionStatus.RECORDING) {
        throw new PipelineError(
          "InvalidTransition",
          `Cannot call ingestSegment() on session ${sessionId} in "${session.status}" state`,
        );
      }
      const segments = [...(session.transcript?.segments ?? []), valid];
      return this.save(session, { transcript: buildTranscript(segments) });
    });
  }

  /** Buffers an audio chunk and forwards it to the live channel. Only legal while recording. */
  feedAudio(tenantId: string, sessionId: string, chunk: Buffer): Promise<void> {
    return this.serialize(tenantId, sessionId, async () => {
      const session = await this.getSession(tenantId, sessionId);
      if (session.status !== SessionStatus.RECORDING) {
        throw new PipelineError(
          "InvalidTransition",
          `Cannot call feedAudio() on session ${sessionId} in "${session.status}" state`,
        );
      }
      if (chunk.length === 0) return;

      const key = sessionKey(tenantId, sessionId);
      const chunks = this.audioChunks.get(key) ?? [];
      chunks.push(Buffer.from(chunk));
      this.audioChunks.set(key, chunks);
      this.channels.get(key)?.sendAudio(chunk);
    });
  }

  /**
   * recording → processing → completed (or error).
   *
   * Audio is written to the Blob Store before `audioRef` is set. The
   * transcript is finalized under a deadline; on failure the session moves to
   * error with whatever partial transcript it already had. The live channel
   * is closed on every path. Completion listeners run after the session is
   * persisted as completed.
   */
  async complete(tenantId: string, sessionId: string, finalAudioRef?: BlobHandle): Promise<Session> {
    const result = await this.serialize(tenantId, sessionId, async () => {
      const current = await this.getSession(tenantId, sessionId);
      assertTransition(current, SessionStatus.PROCESSING, "complete");

      if (finalAudioRef && !(await this.blobs.exists(tenantId, finalAudioRef))) {
        throw new PipelineError("NotFound", `Audio blob not found: ${finalAudioRef.blobId}`);
      }

      let session = await this.save(current, { status: SessionStatus.PROCESSING });
      this.logger.info("Session processing", { tenantId, sessionId });

      const key = sessionKey(tenantId, sessionId);
      try {
        let audio: Buffer | null = null;
        if (finalAudioRef) {
          audio = await this.blobs.read(tenantId, finalAudioRef);
          session = await this.save(session, { audioRef: finalAudioRef });
        } else {
          const chunks = this.audioChunks.get(key) ?? [];
          if (chunks.length > 0) {
            audio = Buffer.concat(chunks);
            const handle = await this.blobs.put(tenantId, audio, LIVE_AUDIO_CONTENT_TYPE);
            session = await this.save(session, { audioRef: handle });
          }
        }

        const liveSegments = session.transcript?.segments ?? [];
        const segments = await withDeadline(
          "Transcript finalization",
          this.transcriptionTimeoutMs,
          (signal) => this.finalizeSegments(audio, liveSegments, signal),
        );

        const completed = await this.save(session, {
          status: SessionStatus.COMPLETED,
          transcript: buildTranscript(segments),
          completedAt: this.timestamp(),
        });
        this.logger.info("Session completed", {
          tenantId,
          sessionId,
          segments: segments.length,
          audio: completed.audioRef !== null,
        });
        return { session: completed, completed: true };
      } catch (err) {
        const reason = errorMessage(err);
        this.logger.error("Transcript finalization failed", { tenantId, sessionId, error: reason });
        try {
          const failed = await this.save(session, {
            status: SessionStatus.ERROR,
            error: { reason, at: this.timestamp() },
          });
          return { session: failed, completed: false };
        } catch (saveErr) {
          // The stored session stays in processing; fail() moves it to error
          // once storage is back.
          this.logger.error("Could not record finalization failure; session left in processing", {
            tenantId,
            sessionId,
            error: errorMessage(saveErr),
          });
          throw saveErr;
        }
      } finally {
        this.releaseChannel(key);
      }
    });

    if (result.completed) {
      await this.notifyCompleted(result.session);
    }
    return result.session;
  }

  /** Administrative move to error from any non-terminal state. */
  fail(tenantId: string, sessionId: string, reason: string): Promise<Session> {
    return this.serialize(tenantId, sessionId, async () => {
      const session = await this.getSession(tenantId, sessionId);
      assertTransition(session, SessionStatus.ERROR, "fail");
      const failed = await this.save(session, {
        status: SessionStatus.ERROR,
        error: { reason, at: this.timestamp() },
      });
      this.releaseChannel(sessionKey(tenantId, sessionId));
      this.logger.warn("Session failed", { tenantId, sessionId, reason });
      return failed;
    });
  }

  /** Records when scoring last started. Not a state change. */
  markScoringTriggered(tenantId: string, sessionId: string, at: Date): Promise<Session> {
    return this.serialize(tenantId, sessionId, async () => {
      const session = await this.getSession(tenantId, sessionId);
      return this.save(session, { scoringTriggeredAt: at.toISOString() }, false);
    });
  }

  // ─── Reads ────────────────────────────────────────────────────────────────────

  /** @throws PipelineError NotFound */
  async getSession(tenantId: string, sessionId: string): Promise<Session> {
    const session = await this.store.find(tenantId, Keys.session(sessionId));
    if (!session) {
      throw new PipelineError("NotFound", `Session not found: ${sessionId}`);
    }
    return session;
  }

  /** All sessions of a tenant, oldest first. */
  async listSessions(tenantId: string): Promise<Session[]> {
    const sessions: Session[] = [];
    for await (const entry of this.store.scanPrefix(tenantId, "session")) {
      sessions.push(entry.value);
    }
    return sessions.sort((a, b) =>
      a.createdAt === b.createdAt ? a.id.localeCompare(b.id) : a.createdAt < b.createdAt ? -1 : 1,
    );
  }

  // ─── Internals ────────────────────────────────────────────────────────────────

  private async finalizeSegments(
    audio: Buffer | null,
    liveSegments: TranscriptSegment[],
    signal: AbortSignal,
  ): Promise<TranscriptSegment[]> {
    if (audio && audio.length > 0) {
      const batch = await this.transcription.finalize(audio, signal);
      if (batch.length > 0) {
        return batch;
      }
      this.logger.warn("Batch transcription returned nothing; keeping live segments");
    }
    const finals = liveSegments.filter((segment) => segment.isFinal);
    return finals.length > 0 ? finals : liveSegments;
  }

  private handleLiveSegment(tenantId: string, sessionId: string, segment: TranscriptSegment): void {
    const listeners = this.segmentListeners.get(sessionKey(tenantId, sessionId));
    for (const listener of listeners ?? []) {
      listener(segment);
    }
    if (!segment.isFinal) return;

    this.ingestSegment(tenantId, sessionId, segment).catch((err: unknown) => {
      if (hasErrorKind(err, "InvalidTransition")) {
        this.logger.debug("Dropped live segment outside recording", { tenantId, sessionId });
        return;
      }
      this.logger.warn("Failed to store live segment", { tenantId, sessionId, error: errorMessage(err) });
    });
  }

  private async notifyCompleted(session: Session): Promise<void> {
    for (const listener of this.completionListeners) {
      try {
        await listener(session);
      } catch (err) {
        this.logger.error("Completion listener failed", {
          tenantId: session.tenantId,
          sessionId: session.id,
          error: errorMessage(err),
        });
      }
    }
  }

  private releaseChannel(key: string): void {
    const channel = this.channels.get(key);
    if (channel) {
      if (channel.qualityWarning) {
        this.logger.warn("Live transcription quality warning", { session: key });
      }
      channel.close();
      this.channels.delete(key);
    }
    this.audioChunks.delete(key);
  }

  private async save(session: Session, changes: Partial<Session>, touch = true): Promise<Session> {
    const next: Session = {
      ...session,
      ...changes,
      updatedAt: touch ? this.timestamp() : session.updatedAt,
    };
    await this.store.put(session.tenantId, Keys.session(session.id), next);
    return next;
  }

  /**
   * Runs `fn` after every earlier mutation of the same session has settled.
   * A rejected step does not block the ones queued behind it.
   */
  private serialize<T>(tenantId: string, sessionId: string, fn: () => Promise<T>): Promise<T> {
    const key = sessionKey(tenantId, sessionId);
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.queues.set(key, tail);
    void tail.then(() => {
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    });
    return run;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function sessionKey(tenantId: string, sessionId: string): string {
  return `${tenantId}\u0000${sessionId}`;
}
