// Pitch Scoring Pipeline - Pitch Analysis
// On-demand analyses over completed sessions that sit beside scoring: a
// sponsor-tool breakdown for one pitch and a side-by-side comparison of
// several. Results go back to the caller and are never stored.

import { z } from "zod";
import type { AnalysisGateway, AnalysisPrompt } from "./analysis-gateway.js";
import { AnalysisCapabilityError, PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { MAX_TOTAL, RUBRIC } from "./scoring-rubric.js";
import type { SessionManager } from "./session-manager.js";
import { CATEGORY_NAMES, SessionStatus } from "./types.js";
import type { Session } from "./types.js";

/** Minimum number of sponsor tools a pitch must integrate. */
export const MIN_SPONSOR_TOOLS = 3;

// ─── Result types ───────────────────────────────────────────────────────────────

export type InnovationLevel = "low" | "medium" | "high";

export interface ToolUsage {
  toolName: string;
  usageDescription: string;
  agenticBehavior: string;
  innovationLevel: InnovationLevel;
  /** True when the tool is on the expected sponsor list. */
  expected: boolean;
}

export interface ToolUsageAnalysis {
  sessionId: string;
  teamName: string;
  expectedTools: string[];
  tools: ToolUsage[];
  toolCount: number;
  meetsMinimumRequirement: boolean;
  /** Expected sponsor tools the pitch never mentioned. */
  missingExpectedTools: string[];
  agenticBehaviors: string[];
  toolScore: number;
  improvementSuggestions: string[];
  analyzedAt: string;
}

export interface ComparedPitch {
  sessionId: string;
  teamName: string;
  title: string;
}

export interface ComparisonRanking {
  rank: number;
  sessionId: string;
  teamName: string;
  totalScore: number;
  rationale: string;
}

export interface PitchComparison {
  pitches: ComparedPitch[];
  /** Sessions asked for but left out because they had no transcript. */
  skipped: string[];
  criteria: string[];
  ranking: ComparisonRanking[];
  criteriaAnalysis: Record<string, { strongest: string; reasoning: string }>;
  keyDifferentiators: string[];
  judgeCommentary: string;
  comparedAt: string;
}

// ─── Reply schemas ──────────────────────────────────────────────────────────────

const ToolUsageReplySchema = z.object({
  tools_identified: z.array(
    z.object({
      tool_name: z.string().trim().min(1),
      usage_description: z.string().default(""),
      agentic_behavior_enabled: z.string().default(""),
      innovation_level: z.enum(["low", "medium", "high"]).catch("medium"),
    }),
  ),
  agentic_behaviors: z.array(z.string()).default([]),
  tool_score: z.number().finite().min(0).max(RUBRIC.tools.maxScore),
  improvement_suggestions: z.array(z.string()).default([]),
});

const ComparisonReplySchema = z.object({
  ranking: z
    .array(
      z.object({
        rank: z.number().int().min(1),
        session_id: z.string().min(1),
        total_score: z.number().finite().min(0).max(MAX_TOTAL),
        rationale: z.string().default(""),
      }),
    )
    .min(2),
  criteria_analysis: z.record(z.object({ strongest: z.string(), reasoning: z.string().default("") })).default({}),
  key_differentiators: z.array(z.string()).default([]),
  judge_commentary: z.string().default(""),
});

// ─── Prompts ────────────────────────────────────────────────────────────────────

const TOOL_SYSTEM_PROMPT = `You are an expert at analyzing AI agent tool integration. Identify the sponsor tools a pitch uses and how they enable agentic behavior. Be specific about tool names and usage patterns.
Respond with ONLY a JSON object in this shape:
{
  "tools_identified": [
    { "tool_name": string, "usage_description": string, "agentic_behavior_enabled": string, "innovation_level": "low" | "medium" | "high" }
  ],
  "agentic_behaviors": [string],
  "tool_score": number,
  "improvement_suggestions": [string]
}
tool_score is between 0 and ${RUBRIC.tools.maxScore}.`;

const COMPARISON_SYSTEM_PROMPT = `You are an expert judge comparing AI agent pitch presentations.
Respond with ONLY a JSON object in this shape:
{
  "ranking": [ { "rank": number, "session_id": string, "total_score": number, "rationale": string } ],
  "criteria_analysis": { "<criterion>": { "strongest": "<session_id>", "reasoning": string } },
  "key_differentiators": [string],
  "judge_commentary": string
}
Rank every pitch exactly once. total_score is between 0 and ${MAX_TOTAL}.`;

export function buildToolUsagePrompt(session: Session, transcript: string, sponsorTools: string[]): AnalysisPrompt {
  const lines = [`TEAM: ${session.teamName}`, `TITLE: ${session.title}`];
  if (sponsorTools.length > 0) {
    lines.push(`EXPECTED SPONSOR TOOLS: ${sponsorTools.join(", ")}`);
  }
  lines.push(
    "",
    "REQUIREMENTS:",
    `- Must integrate at least ${MIN_SPONSOR_TOOLS} sponsor tools`,
    "- Tools should enable sophisticated agentic behavior",
    "- Integration should show synergy and innovation",
    "",
    "TRANSCRIPT:",
    transcript,
  );
  return { system: TOOL_SYSTEM_PROMPT, user: lines.join("\n") };
}

export function buildComparisonPrompt(
  pitches: Array<ComparedPitch & { transcript: string }>,
  criteria: string[],
): AnalysisPrompt {
  const lines = [`Compare these pitches on: ${criteria.join(", ")}.`];
  pitches.forEach((pitch, i) => {
    lines.push(
      "",
      `PITCH ${i + 1}: ${pitch.teamName} - ${pitch.title}`,
      `SESSION ID: ${pitch.sessionId}`,
      `TRANSCRIPT: ${pitch.transcript}`,
    );
  });
  const user = lines.join("\n");
  return { system: COMPARISON_SYSTEM_PROMPT, user };
}

// ─── Analyzer ───────────────────────────────────────────────────────────────────

export interface AnalyzeToolUsageOptions {
  /** Overrides the configured sponsor tool list for this call. */
  sponsorTools?: string[];
  signal?: AbortSignal;
}

export interface ComparePitchesOptions {
  /** Defaults to the four rubric categories. */
  criteria?: string[];
  signal?: AbortSignal;
}

export interface PitchAnalyzerOptions {
  sessions: SessionManager;
  analysis: AnalysisGateway;
  sponsorTools?: string[];
  logger?: Logger;
  now?: () => Date;
}

export class PitchAnalyzer {
  private readonly sessions: SessionManager;
  private readonly analysis: AnalysisGateway;
  private readonly sponsorTools: string[];
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: PitchAnalyzerOptions) {
    this.sessions = options.sessions;
    this.analysis = options.analysis;
    this.sponsorTools = options.sponsorTools ?? [];
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws PipelineError InvalidTransition for a session that is not
   *   completed, InvalidInput when it has no transcript.
   */
  async analyzeToolUsage(
    tenantId: string,
    sessionId: string,
    options: AnalyzeToolUsageOptions = {},
  ): Promise<ToolUsageAnalysis> {
    const session = await this.completedSession(tenantId, sessionId);
    const transcript = transcriptOf(session);
    if (transcript.length === 0) {
      throw new PipelineError("InvalidInput", "No transcript available for tool analysis");
    }

    const expectedTools = options.sponsorTools ?? this.sponsorTools;
    const reply = await this.analysis.complete(
      buildToolUsagePrompt(session, transcript, expectedTools),
      ToolUsageReplySchema,
      { signal: options.signal },
    );

    // The model may name a tool twice; count each once.
    const seen = new Set<string>();
    const tools: ToolUsage[] = [];
    for (const tool of reply.tools_identified) {
      const key = tool.tool_name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      tools.push({
        toolName: tool.tool_name,
        usageDescription: tool.usage_description,
        agenticBehavior: tool.agentic_behavior_enabled,
        innovationLevel: tool.innovation_level,
        expected: expectedTools.some((name) => name.toLowerCase() === key),
      });
    }

    const result: ToolUsageAnalysis = {
      sessionId,
      teamName: session.teamName,
      expectedTools,
      tools,
      toolCount: tools.length,
      meetsMinimumRequirement: tools.length >= MIN_SPONSOR_TOOLS,
      missingExpectedTools: expectedTools.filter((name) => !seen.has(name.toLowerCase())),
      agenticBehaviors: reply.agentic_behaviors,
      toolScore: reply.tool_score,
      improvementSuggestions: reply.improvement_suggestions,
      analyzedAt: this.now().toISOString(),
    };
    this.logger.info("Tool usage analyzed", { tenantId, sessionId, toolCount: result.toolCount });
    return result;
  }

  /**
   * Compares two or more completed pitches. Sessions without a transcript are
   * skipped; at least two must remain.
   *
   * @throws PipelineError InvalidInput for fewer than two usable sessions,
   *   NotFound for an unknown one.
   */
  async comparePitches(
    tenantId: string,
    sessionIds: string[],
    options: ComparePitchesOptions = {},
  ): Promise<PitchComparison> {
    const ids = [...new Set(sessionIds)];
    if (ids.length < 2) {
      throw new PipelineError("InvalidInput", "Need at least 2 distinct sessions to compare");
    }
    const criteria = options.criteria && options.criteria.length > 0 ? options.criteria : [...CATEGORY_NAMES];

    const pitches: Array<ComparedPitch & { transcript: string }> = [];
    const skipped: string[] = [];
    for (const id of ids) {
      const session = await this.completedSession(tenantId, id);
      const transcript = transcriptOf(session);
      if (transcript.length === 0) {
        skipped.push(id);
        continue;
      }
      pitches.push({ sessionId: id, teamName: session.teamName, title: session.title, transcript });
    }
    if (pitches.length < 2) {
      throw new PipelineError("InvalidInput", "Need at least 2 pitches with transcripts for comparison");
    }

    const reply = await this.analysis.complete(buildComparisonPrompt(pitches, criteria), ComparisonReplySchema, {
      signal: options.signal,
    });

    const byId = new Map(pitches.map((pitch) => [pitch.sessionId, pitch]));
    const rankedIds = new Set(reply.ranking.map((entry) => entry.session_id));
    const coversEachOnce =
      rankedIds.size === reply.ranking.length &&
      rankedIds.size === pitches.length &&
      [...rankedIds].every((id) => byId.has(id));
    if (!coversEachOnce) {
      throw new AnalysisCapabilityError(
        "validation",
        "Comparison ranking does not cover each compared session exactly once",
      );
    }

    const ranking = [...reply.ranking]
      .sort((a, b) => a.rank - b.rank || b.total_score - a.total_score)
      .map((entry, i): ComparisonRanking => ({
        rank: i + 1,
        sessionId: entry.session_id,
        teamName: byId.get(entry.session_id)?.teamName ?? "",
        totalScore: entry.total_score,
        rationale: entry.rationale,
      }));

    const criteriaAnalysis: PitchComparison["criteriaAnalysis"] = {};
    for (const criterion of criteria) {
      const analysis = reply.criteria_analysis[criterion];
      if (analysis) {
        criteriaAnalysis[criterion] = analysis;
      }
    }

    this.logger.info("Pitches compared", { tenantId, pitches: pitches.length, skipped: skipped.length });
    return {
      pitches: pitches.map(({ sessionId, teamName, title }) => ({ sessionId, teamName, title })),
      skipped,
      criteria,
      ranking,
      criteriaAnalysis,
      keyDifferentiators: reply.key_differentiators,
      judgeCommentary: reply.judge_commentary,
      comparedAt: this.now().toISOString(),
    };
  }

  private async completedSession(tenantId: string, sessionId: string): Promise<Session> {
    const session = await this.sessions.getSession(tenantId, sessionId);
    if (session.status !== SessionStatus.COMPLETED) {
      throw new PipelineError(
        "InvalidTransition",
        `Cannot analyze session ${sessionId} in "${session.status}" state; only completed sessions can be analyzed`,
      );
    }
    return session;
  }
}

function transcriptOf(session: Session): string {
  return session.transcript?.totalText.trim() ?? "";
}
