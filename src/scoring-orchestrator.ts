// Pitch Scoring Pipeline - Scoring Orchestrator
// Scores a completed session through the fallback chain and writes exactly
// one ScoreRecord per session. The record is staged in memory and committed
// with a single put, so a cancelled or failed run writes nothing.

import { PipelineError, errorMessage } from "./errors.js";
import { KeyedInFlight } from "./keyed-lock.js";
import type { ConcurrencyPolicy } from "./keyed-lock.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { SessionManager } from "./session-manager.js";
import { MAX_TOTAL } from "./scoring-rubric.js";
import { sumCategories } from "./scoring-tiers.js";
import type { FallbackChain, ScoringContext } from "./scoring-tiers.js";
import { Keys } from "./tenant-store.js";
import type { TenantStore } from "./tenant-store.js";
import { SessionStatus } from "./types.js";
import type { ScoreRecord, ScoringMethod } from "./types.js";

export interface ScoreOptions {
  judgeId?: string;
  /** Overrides the configured sponsor tool list for this call. */
  sponsorTools?: string[];
  focusAreas?: string[];
  signal?: AbortSignal;
}

export type ScoreWrittenListener = (record: ScoreRecord) => void;

export interface ScoringOrchestratorOptions {
  store: TenantStore;
  sessions: SessionManager;
  chain: FallbackChain;
  concurrentScoring?: ConcurrencyPolicy;
  sponsorTools?: string[];
  logger?: Logger;
  now?: () => Date;
}

/** Tiers that need transcript text; an empty transcript skips straight past them. */
const TEXT_TIERS: ReadonlySet<ScoringMethod> = new Set<ScoringMethod>(["rag_enhanced", "structured_llm"]);

export class ScoringOrchestrator {
  private readonly store: TenantStore;
  private readonly sessions: SessionManager;
  private readonly chain: FallbackChain;
  private readonly sponsorTools: string[];
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly inFlight: KeyedInFlight<ScoreRecord>;
  private readonly listeners: ScoreWrittenListener[] = [];

  constructor(options: ScoringOrchestratorOptions) {
    this.store = options.store;
    this.sessions = options.sessions;
    this.chain = options.chain;
    this.sponsorTools = options.sponsorTools ?? [];
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
    this.inFlight = new KeyedInFlight(options.concurrentScoring ?? "join");
  }

  onScoreWritten(listener: ScoreWrittenListener): void {
    this.listeners.push(listener);
  }

  isScoring(tenantId: string, sessionId: string): boolean {
    return this.inFlight.has(lockKey(tenantId, sessionId));
  }

  /**
   * Scores a completed session. Concurrent calls for the same session share
   * one run ("join") or fail with AlreadyScoring ("reject"). A joined caller
   * gets the first caller's record. Each caller's signal cancels only its own
   * wait; the run stops once every caller has cancelled.
   */
  scoreSession(tenantId: string, sessionId: string, options: ScoreOptions = {}): Promise<ScoreRecord> {
    return this.inFlight.run(
      lockKey(tenantId, sessionId),
      (signal) => this.runScoring(tenantId, sessionId, options, signal),
      { signal: options.signal, label: `session ${sessionId}` },
    );
  }

  /** @throws PipelineError NotFound when the session has never been scored. */
  async getScore(tenantId: string, sessionId: string): Promise<ScoreRecord> {
    const record = await this.store.find(tenantId, Keys.score(sessionId));
    if (!record) {
      throw new PipelineError("NotFound", `Score not found for session: ${sessionId}`);
    }
    return record;
  }

  async listScores(tenantId: string): Promise<ScoreRecord[]> {
    const records: ScoreRecord[] = [];
    for await (const entry of this.store.scanPrefix(tenantId, "score")) {
      records.push(entry.value);
    }
    return records;
  }

  private async runScoring(
    tenantId: string,
    sessionId: string,
    options: ScoreOptions,
    signal: AbortSignal,
  ): Promise<ScoreRecord> {
    const session = await this.sessions.getSession(tenantId, sessionId);
    if (session.status !== SessionStatus.COMPLETED) {
      throw new PipelineError(
        "InvalidTransition",
        `Cannot score session ${sessionId} in "${session.status}" state; only completed sessions can be scored`,
      );
    }

    const startedAt = this.now();
    const transcriptText = session.transcript?.totalText.trim() ?? "";
    const context: ScoringContext = {
      tenantId,
      session,
      transcriptText,
      sponsorTools: options.sponsorTools ?? this.sponsorTools,
      focusAreas: options.focusAreas ?? [],
    };

    if (transcriptText.length === 0) {
      this.logger.info("Empty transcript; scoring heuristically", { tenantId, sessionId });
    }
    const result = await this.chain.run(context, signal, transcriptText.length === 0 ? TEXT_TIERS : undefined);

    const categories = result.outcome.categories;
    const record: ScoreRecord = {
      tenantId,
      sessionId,
      teamName: session.teamName,
      title: session.title,
      judgeId: options.judgeId ?? null,
      categories,
      overall: {
        totalScore: sumCategories(categories),
        maxTotal: MAX_TOTAL,
        summary: result.outcome.summary,
      },
      methodUsed: result.methodUsed,
      scoredAt: this.now().toISOString(),
      scoringContextRef: result.outcome.scoringContextRef,
      tierFailures: result.tierFailures,
    };

    if (signal.aborted) {
      throw new PipelineError("Cancelled", "Scoring was cancelled before the result was saved");
    }
    await this.store.put(tenantId, Keys.score(sessionId), record);

    try {
      await this.sessions.markScoringTriggered(tenantId, sessionId, startedAt);
    } catch (err) {
      this.logger.warn("Could not annotate session with scoring time", {
        tenantId,
        sessionId,
        error: errorMessage(err),
      });
    }

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err) {
        this.logger.error("Score listener failed", { tenantId, sessionId, error: errorMessage(err) });
      }
    }

    this.logger.info("Session scored", {
      tenantId,
      sessionId,
      methodUsed: record.methodUsed,
      totalScore: record.overall.totalScore,
      failedTiers: record.tierFailures.length,
    });
    return record;
  }
}

function lockKey(tenantId: string, sessionId: string): string {
  return `${tenantId}\u0000${sessionId}`;
}
