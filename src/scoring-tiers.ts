// Pitch Scoring Pipeline - Scoring tiers
// Three ways to score a pitch, tried in order by a FallbackChain:
//   1. rag_enhanced    rubric passages retrieved from the tenant's index
//   2. structured_llm  the fixed rubric embedded in the prompt
//   3. heuristic       transcript statistics, no external calls
// Each tier gets its own deadline; expiry counts as that tier failing.

import { z } from "zod";
import type { AnalysisGateway } from "./analysis-gateway.js";
import { AnalysisCapabilityError, PipelineError, errorMessage, hasErrorKind } from "./errors.js";
import { scoreHeuristically } from "./heuristic-scorer.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { withDeadline } from "./retry.js";
import type { RetrievalIndex } from "./retrieval-index.js";
import { RUBRIC, buildRagPrompt, buildStructuredPrompt } from "./scoring-rubric.js";
import type { PitchContext } from "./scoring-rubric.js";
import { CATEGORY_NAMES } from "./types.js";
import type { CategoryName, CategoryScore, ScoringContextRef, ScoringMethod, Session, TierFailure } from "./types.js";

// ─── Tier contract ──────────────────────────────────────────────────────────────

export interface ScoringContext {
  tenantId: string;
  session: Session;
  transcriptText: string;
  sponsorTools: string[];
  focusAreas: string[];
}

export interface TierOutcome {
  categories: Record<CategoryName, CategoryScore>;
  summary: string;
  scoringContextRef: ScoringContextRef[] | null;
}

export interface ScoringTier {
  readonly id: ScoringMethod;
  score(context: ScoringContext, signal: AbortSignal): Promise<TierOutcome>;
}

// ─── Analysis output schema ─────────────────────────────────────────────────────

function categoryValue(maxScore: number) {
  const score = z.number().finite().min(0).max(maxScore);
  return z.union([score, z.object({ score, feedback: z.string().optional() })]);
}

/**
 * What the analysis capability must return. Categories may be bare numbers or
 * `{ score, feedback }`; `overall` is optional and only cross-checked.
 */
export const AnalysisOutputSchema = z.object({
  idea: categoryValue(RUBRIC.idea.maxScore),
  technical: categoryValue(RUBRIC.technical.maxScore),
  tools: categoryValue(RUBRIC.tools.maxScore),
  presentation: categoryValue(RUBRIC.presentation.maxScore),
  overall: z
    .union([
      z.number().finite(),
      z.object({ total_score: z.number().finite(), summary: z.string().optional() }),
    ])
    .optional(),
});

export type AnalysisOutput = z.infer<typeof AnalysisOutputSchema>;

export function sumCategories(categories: Record<CategoryName, CategoryScore>): number {
  const total = CATEGORY_NAMES.reduce((sum, name) => sum + categories[name].score, 0);
  return Math.round(total * 100) / 100;
}

/**
 * Converts validated analysis output into category scores. The category sum
 * is authoritative; a differing reported overall is only logged.
 */
export function fromAnalysisOutput(
  output: AnalysisOutput,
  tier: ScoringMethod,
  logger: Logger,
): Omit<TierOutcome, "scoringContextRef"> {
  const toScore = (name: CategoryName): CategoryScore => {
    const value = output[name];
    return typeof value === "number"
      ? { score: value, maxScore: RUBRIC[name].maxScore, feedback: "" }
      : { score: value.score, maxScore: RUBRIC[name].maxScore, feedback: value.feedback?.trim() ?? "" };
  };
  const categories: Record<CategoryName, CategoryScore> = {
    idea: toScore("idea"),
    technical: toScore("technical"),
    tools: toScore("tools"),
    presentation: toScore("presentation"),
  };

  const total = sumCategories(categories);
  const overall = output.overall;
  const reported = typeof overall === "number" ? overall : overall?.total_score;
  if (reported !== undefined && Math.abs(reported - total) > 0.01) {
    logger.warn("Reported overall differs from category sum; using the sum", { tier, reported, total });
  }
  const summary = typeof overall === "object" ? (overall.summary?.trim() ?? "") : "";
  return { categories, summary };
}

function pitchContext(context: ScoringContext): PitchContext {
  return {
    teamName: context.session.teamName,
    title: context.session.title,
    transcript: context.transcriptText,
    sponsorTools: context.sponsorTools,
    focusAreas: context.focusAreas,
  };
}

// ─── Tier 1: retrieval-augmented ────────────────────────────────────────────────

export const RUBRIC_TOP_K = 3;

export class RagEnhancedTier implements ScoringTier {
  readonly id = "rag_enhanced";

  constructor(
    private readonly index: RetrievalIndex,
    private readonly analysis: AnalysisGateway,
    private readonly logger: Logger = silentLogger,
  ) {}

  async score(context: ScoringContext, signal: AbortSignal): Promise<TierOutcome> {
    const hits = await this.index.query(context.tenantId, "rubric", context.transcriptText, RUBRIC_TOP_K, { signal });
    if (hits.length === 0) {
      throw new PipelineError("IndexEmpty", `No rubric documents indexed for tenant ${context.tenantId}`);
    }
    const indexed = await this.index.latestTranscript(context.tenantId, context.session.id);

    const prompt = buildRagPrompt(
      pitchContext(context),
      hits.map((hit) => hit.document.text),
      indexed?.text ?? null,
    );
    const output = await this.analysis.complete(prompt, AnalysisOutputSchema, { signal });

    return {
      ...fromAnalysisOutput(output, this.id, this.logger),
      scoringContextRef: hits.map((hit) => ({
        docId: hit.document.docId,
        documentType: hit.document.documentType,
        similarity: hit.similarity,
      })),
    };
  }
}

// ─── Tier 2: fixed rubric ───────────────────────────────────────────────────────

export class StructuredLlmTier implements ScoringTier {
  readonly id = "structured_llm";

  constructor(
    private readonly analysis: AnalysisGateway,
    private readonly logger: Logger = silentLogger,
  ) {}

  async score(context: ScoringContext, signal: AbortSignal): Promise<TierOutcome> {
    const output = await this.analysis.complete(buildStructuredPrompt(pitchContext(context)), AnalysisOutputSchema, {
      signal,
    });
    return { ...fromAnalysisOutput(output, this.id, this.logger), scoringContextRef: null };
  }
}

// ─── Tier 3: heuristic ──────────────────────────────────────────────────────────

export class HeuristicTier implements ScoringTier {
  readonly id = "heuristic";

  async score(context: ScoringContext): Promise<TierOutcome> {
    const result = scoreHeuristically({
      transcript: context.session.transcript,
      recordingStartedAt: context.session.recordingStartedAt,
      completedAt: context.session.completedAt,
      sponsorTools: context.sponsorTools,
    });
    return { categories: result.categories, summary: result.summary, scoringContextRef: null };
  }
}

// ─── Fallback chain ─────────────────────────────────────────────────────────────

export interface ChainResult {
  outcome: TierOutcome;
  methodUsed: ScoringMethod;
  tierFailures: TierFailure[];
}

export interface FallbackChainOptions {
  tierTimeoutMs: number;
  logger?: Logger;
}

export class FallbackChain {
  private readonly tiers: readonly ScoringTier[];
  private readonly tierTimeoutMs: number;
  private readonly logger: Logger;

  constructor(tiers: readonly ScoringTier[], options: FallbackChainOptions) {
    if (tiers.length === 0) {
      throw new Error("FallbackChain needs at least one tier");
    }
    this.tiers = tiers;
    this.tierTimeoutMs = options.tierTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  get tierIds(): ScoringMethod[] {
    return this.tiers.map((tier) => tier.id);
  }

  /**
   * Tries each tier in order and returns the first success. Cancellation of
   * the parent signal stops the chain instead of falling through.
   */
  async run(context: ScoringContext, signal?: AbortSignal, skip: ReadonlySet<ScoringMethod> = new Set()): Promise<ChainResult> {
    const tierFailures: TierFailure[] = [];

    for (const tier of this.tiers) {
      if (skip.has(tier.id)) continue;
      if (signal?.aborted) {
        throw new PipelineError("Cancelled", "Scoring was cancelled");
      }

      try {
        const outcome = await withDeadline(
          `${tier.id} tier`,
          this.tierTimeoutMs,
          (tierSignal) => tier.score(context, tierSignal),
          signal,
        );
        return { outcome, methodUsed: tier.id, tierFailures };
      } catch (err) {
        if (hasErrorKind(err, "Cancelled") && signal?.aborted) {
          throw err;
        }
        const reason = errorMessage(err);
        this.logger.warn("Scoring tier failed", {
          tier: tier.id,
          tenantId: context.tenantId,
          sessionId: context.session.id,
          error: reason,
        });
        tierFailures.push({ tier: tier.id, reason });
      }
    }

    throw new AnalysisCapabilityError(
      "provider",
      `All scoring tiers failed: ${tierFailures.map((f) => `${f.tier} (${f.reason})`).join("; ")}`,
    );
  }
}
