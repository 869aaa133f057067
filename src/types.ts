// Pitch Scoring Pipeline - Shared TypeScript interfaces and types
// Every persisted entity carries its tenantId; timestamps are ISO-8601 strings
// so records survive a JSON round-trip through the tenant store unchanged.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionStatus {
  INITIALIZING = "initializing",
  READY_TO_RECORD = "ready_to_record",
  RECORDING = "recording",
  PROCESSING = "processing",
  COMPLETED = "completed",
  ERROR = "error",
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

export interface TranscriptSegment {
  text: string;
  startOffset: number; // seconds from recording start
  endOffset: number; // seconds from recording start
  confidence: number; // [0, 1]
  isFinal: boolean; // true for finalized segments, false for interim
}

export interface Transcript {
  segments: TranscriptSegment[];
  /** Derived from the segments; never edited on its own. */
  totalText: string;
}

// ─── Blob handles ───────────────────────────────────────────────────────────────

export interface BlobHandle {
  tenantId: string;
  blobId: string;
  contentType: string;
  size: number;
  createdAt: string;
}

export interface SignedBlobUrl {
  url: string;
  expiresAt: string;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface SessionError {
  reason: string;
  at: string;
}

export interface Session {
  id: string;
  tenantId: string;
  teamName: string;
  title: string;
  status: SessionStatus;
  createdAt: string;
  updatedAt: string;
  recordingStartedAt: string | null;
  completedAt: string | null;
  audioRef: BlobHandle | null;
  transcript: Transcript | null;
  error: SessionError | null;
  channelId: string | null;
  /** Side annotation written by the scoring orchestrator; not a state. */
  scoringTriggeredAt: string | null;
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export const CATEGORY_NAMES = ["idea", "technical", "tools", "presentation"] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

export type ScoringMethod = "rag_enhanced" | "structured_llm" | "heuristic";

export interface CategoryScore {
  score: number;
  maxScore: number;
  feedback: string;
}

export interface OverallScore {
  /** Always the sum of the category scores. */
  totalScore: number;
  maxTotal: number;
  summary: string;
}

export interface ScoringContextRef {
  docId: string;
  documentType: DocumentType;
  similarity: number;
}

export interface TierFailure {
  tier: ScoringMethod;
  reason: string;
}

export interface ScoreRecord {
  tenantId: string;
  sessionId: string;
  teamName: string;
  title: string;
  judgeId: string | null;
  categories: Record<CategoryName, CategoryScore>;
  overall: OverallScore;
  methodUsed: ScoringMethod;
  scoredAt: string;
  scoringContextRef: ScoringContextRef[] | null;
  tierFailures: TierFailure[];
}

// ─── Retrieval ──────────────────────────────────────────────────────────────────

export type DocumentType = "rubric" | "transcript" | "team_profile";

export const DOCUMENT_TYPES: readonly DocumentType[] = ["rubric", "transcript", "team_profile"];

export type DocumentMetadata = Record<string, string | number | boolean>;

export interface RetrievalDocument {
  docId: string;
  tenantId: string;
  documentType: DocumentType;
  text: string;
  embedding: number[];
  metadata: DocumentMetadata;
  indexedAt: string;
  /** Monotonic insertion counter; breaks recency ties between equal timestamps. */
  seq: number;
}

export interface RetrievalHit {
  document: RetrievalDocument;
  similarity: number;
}

// ─── Ranking ────────────────────────────────────────────────────────────────────

export type SortKey = "total_score" | CategoryName;

export interface RankEntry {
  rank: number;
  sessionId: string;
  teamName: string;
  title: string;
  totalScore: number;
  sortValue: number;
  methodUsed: ScoringMethod;
  tieBreakKey: string;
}

export interface LeaderboardSnapshot {
  tenantId: string;
  sortKey: SortKey;
  tieBreakCategory: CategoryName;
  computedAt: string;
  entries: RankEntry[];
}

export interface LeaderboardStats {
  count: number;
  mean: number;
  median: number;
  highest: number;
  lowest: number;
  methods: Record<ScoringMethod, number>;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}
