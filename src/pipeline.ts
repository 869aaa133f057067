// Pitch Scoring Pipeline - Facade
// The surface the HTTP layer (or any other caller) uses. Every operation
// takes the tenant first and returns a PipelineResult; no exception, stack
// trace or raw error text crosses this boundary.

import type { BlobStore } from "./blob-store.js";
import { PipelineError, errorMessage, hasErrorKind, toPublicError } from "./errors.js";
import type { PublicError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type {
  AnalyzeToolUsageOptions,
  ComparePitchesOptions,
  PitchAnalyzer,
  PitchComparison,
  ToolUsageAnalysis,
} from "./pitch-analysis.js";
import type { RankOptions, RankingEngine } from "./ranking-engine.js";
import type { RetrievalIndex } from "./retrieval-index.js";
import type { ScoreOptions, ScoringOrchestrator } from "./scoring-orchestrator.js";
import type { SessionManager } from "./session-manager.js";
import type {
  BlobHandle,
  DocumentMetadata,
  DocumentType,
  LeaderboardSnapshot,
  LeaderboardStats,
  RankEntry,
  RetrievalHit,
  ScoreRecord,
  Session,
  SignedBlobUrl,
  TranscriptSegment,
} from "./types.js";

export type PipelineResult<T> = { ok: true; value: T } | { ok: false; error: PublicError };

export interface ScoringPipelineOptions {
  sessions: SessionManager;
  orchestrator: ScoringOrchestrator;
  ranking: RankingEngine;
  index: RetrievalIndex;
  blobs: BlobStore;
  analyzer: PitchAnalyzer;
  /** Score every session as soon as it completes. */
  autoScoreOnComplete?: boolean;
  logger?: Logger;
}

export class ScoringPipeline {
  private readonly sessions: SessionManager;
  private readonly orchestrator: ScoringOrchestrator;
  private readonly ranking: RankingEngine;
  private readonly index: RetrievalIndex;
  private readonly blobs: BlobStore;
  private readonly analyzer: PitchAnalyzer;
  private readonly autoScoreOnComplete: boolean;
  private readonly logger: Logger;
  private readonly background = new Set<Promise<void>>();

  constructor(options: ScoringPipelineOptions) {
    this.sessions = options.sessions;
    this.orchestrator = options.orchestrator;
    this.ranking = options.ranking;
    this.index = options.index;
    this.blobs = options.blobs;
    this.analyzer = options.analyzer;
    this.autoScoreOnComplete = options.autoScoreOnComplete ?? false;
    this.logger = options.logger ?? silentLogger;

    this.sessions.onCompleted((session) => {
      this.track(this.afterCompletion(session));
    });
    this.orchestrator.onScoreWritten((record) => {
      this.ranking.invalidate(record.tenantId);
    });
  }

  // ─── Sessions ─────────────────────────────────────────────────────────────────

  createSession(tenantId: string, teamName: string, title: string): Promise<PipelineResult<Session>> {
    return this.run("createSession", () => this.sessions.create(tenantId, teamName, title));
  }

  beginRecording(tenantId: string, sessionId: string): Promise<PipelineResult<Session>> {
    return this.run("beginRecording", () => this.sessions.beginRecording(tenantId, sessionId));
  }

  ingestSegment(tenantId: string, sessionId: string, segment: TranscriptSegment): Promise<PipelineResult<Session>> {
    return this.run("ingestSegment", () => this.sessions.ingestSegment(tenantId, sessionId, segment));
  }

  feedAudio(tenantId: string, sessionId: string, chunk: Buffer): Promise<PipelineResult<void>> {
    return this.run("feedAudio", () => this.sessions.feedAudio(tenantId, sessionId, chunk));
  }

  completeSession(tenantId: string, sessionId: string, finalAudioRef?: BlobHandle): Promise<PipelineResult<Session>> {
    return this.run("completeSession", () => this.sessions.complete(tenantId, sessionId, finalAudioRef));
  }

  failSession(tenantId: string, sessionId: string, reason: string): Promise<PipelineResult<Session>> {
    return this.run("failSession", () => this.sessions.fail(tenantId, sessionId, reason));
  }

  getSession(tenantId: string, sessionId: string): Promise<PipelineResult<Session>> {
    return this.run("getSession", () => this.sessions.getSession(tenantId, sessionId));
  }

  listSessions(tenantId: string): Promise<PipelineResult<Session[]>> {
    return this.run("listSessions", () => this.sessions.listSessions(tenantId));
  }

  /** Live segments (interim and final) for one session. Returns an unsubscribe function. */
  subscribeSegments(tenantId: string, sessionId: string, listener: (segment: TranscriptSegment) => void): () => void {
    return this.sessions.subscribeSegments(tenantId, sessionId, listener);
  }

  // ─── Scoring and ranking ──────────────────────────────────────────────────────

  scoreSession(tenantId: string, sessionId: string, options: ScoreOptions = {}): Promise<PipelineResult<ScoreRecord>> {
    return this.run("scoreSession", () => this.orchestrator.scoreSession(tenantId, sessionId, options));
  }

  getScore(tenantId: string, sessionId: string): Promise<PipelineResult<ScoreRecord>> {
    return this.run("getScore", () => this.orchestrator.getScore(tenantId, sessionId));
  }

  rankTenant(tenantId: string, options: RankOptions = {}): Promise<PipelineResult<LeaderboardSnapshot>> {
    return this.run("rankTenant", () => this.ranking.rank(tenantId, options));
  }

  teamRank(tenantId: string, sessionId: string, options: RankOptions = {}): Promise<PipelineResult<RankEntry>> {
    return this.run("teamRank", () => this.ranking.teamRank(tenantId, sessionId, options));
  }

  leaderboardStats(tenantId: string): Promise<PipelineResult<LeaderboardStats>> {
    return this.run("leaderboardStats", () => this.ranking.stats(tenantId));
  }

  // ─── Pitch analysis ───────────────────────────────────────────────────────────

  analyzeToolUsage(
    tenantId: string,
    sessionId: string,
    options: AnalyzeToolUsageOptions = {},
  ): Promise<PipelineResult<ToolUsageAnalysis>> {
    return this.run("analyzeToolUsage", () => this.analyzer.analyzeToolUsage(tenantId, sessionId, options));
  }

  comparePitches(
    tenantId: string,
    sessionIds: string[],
    options: ComparePitchesOptions = {},
  ): Promise<PipelineResult<PitchComparison>> {
    return this.run("comparePitches", () => this.analyzer.comparePitches(tenantId, sessionIds, options));
  }

  // ─── Retrieval and audio ──────────────────────────────────────────────────────

  indexDocument(
    tenantId: string,
    documentType: DocumentType,
    text: string,
    metadata: DocumentMetadata = {},
  ): Promise<PipelineResult<string>> {
    return this.run("indexDocument", () => this.index.index(tenantId, documentType, text, metadata));
  }

  queryDocuments(
    tenantId: string,
    documentType: DocumentType,
    queryText: string,
    topK: number,
  ): Promise<PipelineResult<RetrievalHit[]>> {
    return this.run("queryDocuments", () => this.index.query(tenantId, documentType, queryText, topK));
  }

  /** Time-limited URL for a session's recorded audio. */
  signAudio(tenantId: string, sessionId: string, ttlSeconds: number): Promise<PipelineResult<SignedBlobUrl>> {
    return this.run("signAudio", async () => {
      const session = await this.sessions.getSession(tenantId, sessionId);
      if (!session.audioRef) {
        throw new PipelineError("NotFound", `Session ${sessionId} has no recorded audio`);
      }
      return this.blobs.sign(session.audioRef, ttlSeconds);
    });
  }

  /** Resolves once every background task started by completions has settled. */
  async drain(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  // ─── Internals ────────────────────────────────────────────────────────────────

  /** Indexes the transcript, then (when enabled) scores the session. */
  private async afterCompletion(session: Session): Promise<void> {
    const { tenantId, id: sessionId } = session;
    const text = session.transcript?.totalText ?? "";

    if (text.trim().length > 0) {
      try {
        const { version } = await this.index.indexTranscript(tenantId, sessionId, text, {
          teamName: session.teamName,
          title: session.title,
        });
        this.logger.info("Transcript indexed", { tenantId, sessionId, version });
      } catch (err) {
        this.logger.warn("Transcript indexing failed", { tenantId, sessionId, error: errorMessage(err) });
      }
    }

    if (!this.autoScoreOnComplete) return;
    try {
      await this.orchestrator.scoreSession(tenantId, sessionId);
    } catch (err) {
      if (hasErrorKind(err, "AlreadyScoring")) {
        this.logger.debug("Automatic scoring skipped; already in progress", { tenantId, sessionId });
        return;
      }
      this.logger.error("Automatic scoring failed", { tenantId, sessionId, error: errorMessage(err) });
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task.finally(() => {
      this.background.delete(tracked);
    });
    this.background.add(tracked);
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<PipelineResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      const error = toPublicError(err);
      if (error.kind === "Internal") {
        this.logger.error(`${operation} failed`, {
          error: errorMessage(err),
          stack: err instanceof Error ? err.stack : undefined,
        });
      } else {
        this.logger.debug(`${operation} rejected`, { kind: error.kind, reason: error.reason });
      }
      return { ok: false, error };
    }
  }
}
