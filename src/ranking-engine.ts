// Pitch Scoring Pipeline - Ranking Engine
// Leaderboards are a pure function of a tenant's score records. Snapshots are
// cached per tenant and sort options and dropped whenever a score is written.

import { PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type {
  CategoryName,
  LeaderboardSnapshot,
  LeaderboardStats,
  RankEntry,
  ScoreRecord,
  ScoringMethod,
  SortKey,
} from "./types.js";

export interface RankOptions {
  sortKey?: SortKey;
  tieBreakCategory?: CategoryName;
}

export interface ScoreSource {
  listScores(tenantId: string): Promise<ScoreRecord[]>;
}

function sortValueOf(record: ScoreRecord, sortKey: SortKey): number {
  return sortKey === "total_score" ? record.overall.totalScore : record.categories[sortKey].score;
}

/**
 * Orders records by sort value (descending), then the tie-break category
 * score (descending), then earlier scoredAt, then sessionId. The last key
 * makes the order total, so equal inputs always give identical output.
 */
export function computeLeaderboard(
  tenantId: string,
  records: readonly ScoreRecord[],
  options: { sortKey: SortKey; tieBreakCategory: CategoryName },
  computedAt: Date,
): LeaderboardSnapshot {
  const { sortKey, tieBreakCategory } = options;

  const rows = records.map((record) => ({
    record,
    sortValue: sortValueOf(record, sortKey),
    tieBreak: record.categories[tieBreakCategory].score,
  }));

  rows.sort((a, b) => {
    if (a.sortValue !== b.sortValue) return b.sortValue - a.sortValue;
    if (a.tieBreak !== b.tieBreak) return b.tieBreak - a.tieBreak;
    if (a.record.scoredAt !== b.record.scoredAt) return a.record.scoredAt < b.record.scoredAt ? -1 : 1;
    if (a.record.sessionId === b.record.sessionId) return 0;
    return a.record.sessionId < b.record.sessionId ? -1 : 1;
  });

  const entries: RankEntry[] = rows.map((row, i) => ({
    rank: i + 1,
    sessionId: row.record.sessionId,
    teamName: row.record.teamName,
    title: row.record.title,
    totalScore: row.record.overall.totalScore,
    sortValue: row.sortValue,
    methodUsed: row.record.methodUsed,
    tieBreakKey: `${row.sortValue}|${row.tieBreak}|${row.record.scoredAt}|${row.record.sessionId}`,
  }));

  return {
    tenantId,
    sortKey,
    tieBreakCategory,
    computedAt: computedAt.toISOString(),
    entries,
  };
}

export function computeStats(records: readonly ScoreRecord[]): LeaderboardStats {
  const methods: Record<ScoringMethod, number> = { rag_enhanced: 0, structured_llm: 0, heuristic: 0 };
  for (const record of records) {
    methods[record.methodUsed]++;
  }
  if (records.length === 0) {
    return { count: 0, mean: 0, median: 0, highest: 0, lowest: 0, methods };
  }

  const totals = records.map((record) => record.overall.totalScore).sort((a, b) => a - b);
  const mid = Math.floor(totals.length / 2);
  const median = totals.length % 2 === 0 ? (totals[mid - 1] + totals[mid]) / 2 : totals[mid];
  const mean = totals.reduce((sum, total) => sum + total, 0) / totals.length;

  return {
    count: totals.length,
    mean: Math.round(mean * 100) / 100,
    median: Math.round(median * 100) / 100,
    highest: totals[totals.length - 1],
    lowest: totals[0],
    methods,
  };
}

export interface RankingEngineOptions {
  source: ScoreSource;
  tieBreakCategory?: CategoryName;
  logger?: Logger;
  now?: () => Date;
}

export class RankingEngine {
  private readonly source: ScoreSource;
  private readonly defaultTieBreak: CategoryName;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly cache = new Map<string, Map<string, LeaderboardSnapshot>>();
  /** Bumped by invalidate(); a rank() that started under an older value does not cache. */
  private readonly generations = new Map<string, number>();

  constructor(options: RankingEngineOptions) {
    this.source = options.source;
    this.defaultTieBreak = options.tieBreakCategory ?? "presentation";
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Returns a copy; callers may mutate it without touching the cached snapshot. */
  async rank(tenantId: string, options: RankOptions = {}): Promise<LeaderboardSnapshot> {
    const resolved = {
      sortKey: options.sortKey ?? "total_score",
      tieBreakCategory: options.tieBreakCategory ?? this.defaultTieBreak,
    };
    const optionsKey = `${resolved.sortKey}|${resolved.tieBreakCategory}`;

    const cached = this.cache.get(tenantId)?.get(optionsKey);
    if (cached) {
      return copySnapshot(cached);
    }

    const generation = this.generations.get(tenantId) ?? 0;
    const records = await this.source.listScores(tenantId);
    const snapshot = computeLeaderboard(tenantId, records, resolved, this.now());

    if (generation !== (this.generations.get(tenantId) ?? 0)) {
      this.logger.debug("Leaderboard invalidated while computing; not cached", { tenantId });
      return snapshot;
    }
    let perTenant = this.cache.get(tenantId);
    if (!perTenant) {
      perTenant = new Map();
      this.cache.set(tenantId, perTenant);
    }
    perTenant.set(optionsKey, snapshot);
    this.logger.debug("Leaderboard recomputed", { tenantId, sortKey: resolved.sortKey, entries: snapshot.entries.length });
    return copySnapshot(snapshot);
  }

  invalidate(tenantId: string): void {
    this.cache.delete(tenantId);
    this.generations.set(tenantId, (this.generations.get(tenantId) ?? 0) + 1);
  }

  /** @throws PipelineError NotFound when the session has no score yet. */
  async teamRank(tenantId: string, sessionId: string, options: RankOptions = {}): Promise<RankEntry> {
    const snapshot = await this.rank(tenantId, options);
    const entry = snapshot.entries.find((candidate) => candidate.sessionId === sessionId);
    if (!entry) {
      throw new PipelineError("NotFound", `No ranked score for session: ${sessionId}`);
    }
    return entry;
  }

  async stats(tenantId: string): Promise<LeaderboardStats> {
    return computeStats(await this.source.listScores(tenantId));
  }
}

function copySnapshot(snapshot: LeaderboardSnapshot): LeaderboardSnapshot {
  return { ...snapshot, entries: snapshot.entries.map((entry) => ({ ...entry })) };
}
