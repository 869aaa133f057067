// Unit tests for the scoring tiers and the fallback chain
// Analysis replies go through the same parsing the OpenAI gateway uses.

import { describe, it, expect, vi } from "vitest";
import { AnalysisCapabilityError, PipelineError, hasErrorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { RetrievalIndex } from "./retrieval-index.js";
import { rubricText } from "./scoring-rubric.js";
import {
  AnalysisOutputSchema,
  FallbackChain,
  HeuristicTier,
  RUBRIC_TOP_K,
  RagEnhancedTier,
  StructuredLlmTier,
  fromAnalysisOutput,
  sumCategories,
} from "./scoring-tiers.js";
import type { ScoringContext, ScoringTier, TierOutcome } from "./scoring-tiers.js";
import { ScriptedAnalysisGateway } from "./test-fakes.js";
import { MemoryBackend, TenantStore } from "./tenant-store.js";
import { SessionStatus } from "./types.js";
import type { Session } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

const GOOD_REPLY = '{"idea": 20, "technical": 18, "tools": 19, "presentation": 17, "overall": 74}';

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

function makeSession(text = "We built an agent that books venues through an API."): Session {
  return {
    id: "s1",
    tenantId: "acme",
    teamName: "Acme",
    title: "Demo",
    status: SessionStatus.COMPLETED,
    createdAt: "2026-03-01T10:00:00.000Z",
    updatedAt: "2026-03-01T10:03:00.000Z",
    recordingStartedAt: "2026-03-01T10:00:00.000Z",
    completedAt: "2026-03-01T10:03:00.000Z",
    audioRef: null,
    transcript: {
      segments: [{ text, startOffset: 0, endOffset: 60, confidence: 0.9, isFinal: true }],
      totalText: text,
    },
    error: null,
    channelId: null,
    scoringTriggeredAt: null,
  };
}

function makeContext(overrides: Partial<ScoringContext> = {}): ScoringContext {
  const session = makeSession();
  return {
    tenantId: "acme",
    session,
    transcriptText: session.transcript?.totalText ?? "",
    sponsorTools: ["Deepgram"],
    focusAreas: [],
    ...overrides,
  };
}

function createIndex(analysis: ScriptedAnalysisGateway): RetrievalIndex {
  return new RetrievalIndex({ store: new TenantStore({ backend: new MemoryBackend() }), analysis });
}

/** A tier that always fails with the given error. */
function failingTier(id: ScoringTier["id"], error: Error): ScoringTier {
  return {
    id,
    score: async (): Promise<TierOutcome> => {
      throw error;
    },
  };
}

// ─── Output conversion ────────────────────────────────────────────────────────

describe("fromAnalysisOutput", () => {
  it("accepts bare numbers and { score, feedback } objects", () => {
    const output = AnalysisOutputSchema.parse({
      idea: { score: 20, feedback: "  Clear vertical focus. " },
      technical: 18,
      tools: { score: 19 },
      presentation: 17,
      overall: { total_score: 74, summary: "Strong pitch." },
    });

    const { categories, summary } = fromAnalysisOutput(output, "structured_llm", createSilentLogger());

    expect(categories.idea).toEqual({ score: 20, maxScore: 25, feedback: "Clear vertical focus." });
    expect(categories.technical).toEqual({ score: 18, maxScore: 25, feedback: "" });
    expect(categories.tools).toEqual({ score: 19, maxScore: 25, feedback: "" });
    expect(summary).toBe("Strong pitch.");
    expect(sumCategories(categories)).toBe(74);
  });

  it("keeps the category sum and warns when the reported overall disagrees", () => {
    const logger = createSilentLogger();
    const output = AnalysisOutputSchema.parse({ idea: 20, technical: 18, tools: 19, presentation: 17, overall: 90 });

    const { categories } = fromAnalysisOutput(output, "rag_enhanced", logger);

    expect(sumCategories(categories)).toBe(74);
    expect(logger.warn).toHaveBeenCalledWith("Reported overall differs from category sum; using the sum", {
      tier: "rag_enhanced",
      reported: 90,
      total: 74,
    });
  });

  it("rejects a category above its maximum", () => {
    expect(AnalysisOutputSchema.safeParse({ idea: 26, technical: 0, tools: 0, presentation: 0 }).success).toBe(false);
  });
});

// ─── Tiers ────────────────────────────────────────────────────────────────────

describe("RagEnhancedTier", () => {
  it("fails with IndexEmpty when the tenant has no rubric documents", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY] });
    const tier = new RagEnhancedTier(createIndex(analysis), analysis);

    const err: unknown = await tier.score(makeContext(), new AbortController().signal).catch((e: unknown) => e);

    expect(hasErrorKind(err, "IndexEmpty")).toBe(true);
    expect(err instanceof PipelineError && err.reason).toBe("No rubric documents indexed for tenant acme");
    expect(analysis.prompts).toHaveLength(0);
  });

  it("grounds the prompt in retrieved rubric passages and records them", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY] });
    const index = createIndex(analysis);
    for (const text of ["Live demo under three minutes", "Uses three sponsor tools", "Novel agent idea", "Clear impact"]) {
      await index.index("acme", "rubric", text);
    }
    const tier = new RagEnhancedTier(index, analysis);

    const outcome = await tier.score(makeContext(), new AbortController().signal);

    expect(sumCategories(outcome.categories)).toBe(74);
    expect(outcome.scoringContextRef).toHaveLength(RUBRIC_TOP_K);
    expect(outcome.scoringContextRef?.every((ref) => ref.documentType === "rubric")).toBe(true);
    expect(analysis.prompts[0].user).toContain("RUBRIC (retrieved for this event; cite it in your feedback):");
    expect(analysis.prompts[0].user).toContain("LIVE TRANSCRIPT:\nWe built an agent that books venues through an API.");
  });
});

describe("StructuredLlmTier", () => {
  it("embeds the fixed rubric and has no retrieval context", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY] });
    const tier = new StructuredLlmTier(analysis);

    const outcome = await tier.score(makeContext(), new AbortController().signal);

    expect(sumCategories(outcome.categories)).toBe(74);
    expect(outcome.scoringContextRef).toBeNull();
    expect(analysis.prompts[0].user).toContain(rubricText());
    expect(analysis.prompts[0].user).toContain("SPONSOR TOOLS: Deepgram");
  });

  it("propagates invalid model output as an AnalysisCapabilityError", async () => {
    const tier = new StructuredLlmTier(new ScriptedAnalysisGateway({ replies: ["not json"] }));

    const err: unknown = await tier.score(makeContext(), new AbortController().signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AnalysisCapabilityError);
    expect(err instanceof AnalysisCapabilityError && err.stage).toBe("parse");
  });
});

describe("HeuristicTier", () => {
  it("scores from the session transcript without external calls", async () => {
    const outcome = await new HeuristicTier().score(makeContext());

    expect(outcome.scoringContextRef).toBeNull();
    expect(outcome.summary).toMatch(/^Heuristic estimate: \d+ words over 60s/);
  });
});

// ─── Fallback chain ───────────────────────────────────────────────────────────

describe("FallbackChain", () => {
  it("returns the first tier that succeeds", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY] });
    const chain = new FallbackChain([new StructuredLlmTier(analysis), new HeuristicTier()], { tierTimeoutMs: 1000 });

    const result = await chain.run(makeContext());

    expect(result.methodUsed).toBe("structured_llm");
    expect(result.tierFailures).toEqual([]);
  });

  it("falls through in order and records each failure", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [new Error("rate limited")] });
    const logger = createSilentLogger();
    const chain = new FallbackChain(
      [new RagEnhancedTier(createIndex(analysis), analysis), new StructuredLlmTier(analysis), new HeuristicTier()],
      { tierTimeoutMs: 1000, logger },
    );

    const result = await chain.run(makeContext());

    expect(chain.tierIds).toEqual(["rag_enhanced", "structured_llm", "heuristic"]);
    expect(result.methodUsed).toBe("heuristic");
    expect(result.tierFailures).toEqual([
      { tier: "rag_enhanced", reason: "IndexEmpty: No rubric documents indexed for tenant acme" },
      { tier: "structured_llm", reason: "rate limited" },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("treats an expired tier deadline as that tier failing", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY], completionDelayMs: 500 });
    const chain = new FallbackChain([new StructuredLlmTier(analysis), new HeuristicTier()], { tierTimeoutMs: 20 });

    const result = await chain.run(makeContext());

    expect(result.methodUsed).toBe("heuristic");
    expect(result.tierFailures).toEqual([
      { tier: "structured_llm", reason: "structured_llm tier exceeded its 20ms deadline" },
    ]);
  });

  it("skips the requested tiers", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY] });
    const chain = new FallbackChain([new StructuredLlmTier(analysis), new HeuristicTier()], { tierTimeoutMs: 1000 });

    const result = await chain.run(makeContext(), undefined, new Set(["structured_llm"]));

    expect(result.methodUsed).toBe("heuristic");
    expect(result.tierFailures).toEqual([]);
    expect(analysis.prompts).toHaveLength(0);
  });

  it("throws an AnalysisCapabilityError naming every failure when all tiers fail", async () => {
    const chain = new FallbackChain(
      [failingTier("structured_llm", new Error("boom")), failingTier("heuristic", new Error("no transcript"))],
      { tierTimeoutMs: 1000 },
    );

    const err: unknown = await chain.run(makeContext()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AnalysisCapabilityError);
    expect(err instanceof PipelineError && err.reason).toBe(
      "[provider] All scoring tiers failed: structured_llm (boom); heuristic (no transcript)",
    );
  });

  it("stops with Cancelled when the caller aborts mid-tier", async () => {
    const analysis = new ScriptedAnalysisGateway({ replies: [GOOD_REPLY], completionDelayMs: 500 });
    const heuristic = new HeuristicTier();
    const heuristicScore = vi.spyOn(heuristic, "score");
    const chain = new FallbackChain([new StructuredLlmTier(analysis), heuristic], { tierTimeoutMs: 1000 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const err: unknown = await chain.run(makeContext(), controller.signal).catch((e: unknown) => e);

    expect(hasErrorKind(err, "Cancelled")).toBe(true);
    expect(heuristicScore).not.toHaveBeenCalled();
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const chain = new FallbackChain([new HeuristicTier()], { tierTimeoutMs: 1000 });

    const err: unknown = await chain.run(makeContext(), controller.signal).catch((e: unknown) => e);

    expect(err instanceof PipelineError && err.toPublic()).toEqual({ kind: "Cancelled", reason: "Scoring was cancelled" });
  });

  it("requires at least one tier", () => {
    expect(() => new FallbackChain([], { tierTimeoutMs: 1000 })).toThrow("FallbackChain needs at least one tier");
  });
});
