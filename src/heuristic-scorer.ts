// Pitch Scoring Pipeline - Heuristic scorer
// Deterministic scoring from transcript statistics. This is the last tier of
// the fallback chain: it makes no external calls and cannot fail.

import { RUBRIC } from "./scoring-rubric.js";
import type { CategoryName, CategoryScore, Transcript } from "./types.js";

export const DEMO_KEYWORDS: ReadonlySet<string> = new Set([
  "demo",
  "demonstration",
  "show",
  "example",
  "here",
  "see",
  "look",
  "this",
  "feature",
]);

export const IMPACT_KEYWORDS: ReadonlySet<string> = new Set([
  "impact",
  "result",
  "benefit",
  "improve",
  "solve",
  "help",
  "reduce",
  "increase",
]);

export const TECHNICAL_KEYWORDS: ReadonlySet<string> = new Set([
  "api",
  "tool",
  "integration",
  "data",
  "system",
  "platform",
  "code",
]);

/** Assumed pitch length when neither segment offsets nor timestamps give one. */
export const DEFAULT_DURATION_SECONDS = 180;

const PACE_MIN_WPM = 120;
const PACE_MAX_WPM = 170;
const PACE_CENTER_WPM = 145;

export interface HeuristicInput {
  transcript: Transcript | null;
  recordingStartedAt: string | null;
  completedAt: string | null;
  sponsorTools: string[];
}

export interface TranscriptStats {
  wordCount: number;
  durationSeconds: number;
  wordsPerMinute: number;
  demoHits: number;
  impactHits: number;
  technicalHits: number;
  sponsorToolsMentioned: string[];
}

export interface HeuristicResult {
  categories: Record<CategoryName, CategoryScore>;
  summary: string;
  stats: TranscriptStats;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z0-9']+/g) ?? [];
}

function countHits(tokens: string[], keywords: ReadonlySet<string>): number {
  let hits = 0;
  for (const token of tokens) {
    if (keywords.has(token)) hits++;
  }
  return hits;
}

export function estimateDurationSeconds(input: HeuristicInput): number {
  const segments = input.transcript?.segments ?? [];
  const last = segments[segments.length - 1];
  if (last && last.endOffset > 0) {
    return last.endOffset;
  }
  if (input.recordingStartedAt && input.completedAt) {
    const elapsed = (Date.parse(input.completedAt) - Date.parse(input.recordingStartedAt)) / 1000;
    if (Number.isFinite(elapsed) && elapsed > 0) {
      return elapsed;
    }
  }
  return DEFAULT_DURATION_SECONDS;
}

export function computeStats(input: HeuristicInput): TranscriptStats {
  const text = input.transcript?.totalText ?? "";
  const tokens = tokenize(text);
  const durationSeconds = estimateDurationSeconds(input);
  const lowered = text.toLowerCase();

  return {
    wordCount: tokens.length,
    durationSeconds,
    wordsPerMinute: (tokens.length / durationSeconds) * 60,
    demoHits: countHits(tokens, DEMO_KEYWORDS),
    impactHits: countHits(tokens, IMPACT_KEYWORDS),
    technicalHits: countHits(tokens, TECHNICAL_KEYWORDS),
    sponsorToolsMentioned: input.sponsorTools.filter((tool) => {
      const name = tool.trim().toLowerCase();
      return name.length > 0 && lowered.includes(name);
    }),
  };
}

/** 1 inside the comfortable band, falling off linearly around 145 wpm outside it. */
export function paceFactor(wordCount: number, wordsPerMinute: number): number {
  if (wordCount === 0) return 0;
  if (wordsPerMinute >= PACE_MIN_WPM && wordsPerMinute <= PACE_MAX_WPM) return 1;
  return Math.max(0, 1 - Math.abs(wordsPerMinute - PACE_CENTER_WPM) / PACE_CENTER_WPM);
}

function finalize(raw: number, max: number): number {
  const clamped = Math.min(max, Math.max(0, Number.isFinite(raw) ? raw : 0));
  return Math.round(clamped * 10) / 10;
}

function ratio(value: number, target: number): number {
  return Math.min(1, value / target);
}

export function scoreHeuristically(input: HeuristicInput): HeuristicResult {
  const stats = computeStats(input);
  const configuredTools = input.sponsorTools.filter((tool) => tool.trim().length > 0);

  const ideaMax = RUBRIC.idea.maxScore;
  const technicalMax = RUBRIC.technical.maxScore;
  const toolsMax = RUBRIC.tools.maxScore;
  const presentationMax = RUBRIC.presentation.maxScore;

  const idea = finalize(
    ideaMax * ratio(stats.wordCount, 300) * 0.6 + ideaMax * ratio(stats.impactHits, 5) * 0.4,
    ideaMax,
  );
  const technical = finalize(technicalMax * ratio(stats.technicalHits, 8), technicalMax);
  const tools =
    configuredTools.length > 0
      ? finalize(
          toolsMax * ratio(stats.sponsorToolsMentioned.length, Math.min(3, configuredTools.length)),
          toolsMax,
        )
      : finalize(toolsMax * ratio(stats.technicalHits, 10) * 0.5, toolsMax);
  const pace = paceFactor(stats.wordCount, stats.wordsPerMinute);
  const presentation = finalize(
    presentationMax * pace * 0.5 + presentationMax * ratio(stats.demoHits, 5) * 0.5,
    presentationMax,
  );

  const wpm = Math.round(stats.wordsPerMinute);
  const toolsFeedback =
    configuredTools.length > 0
      ? `Mentioned ${stats.sponsorToolsMentioned.length} of ${configuredTools.length} sponsor tools.`
      : `No sponsor tools configured; ${stats.technicalHits} technical keyword mentions.`;

  return {
    categories: {
      idea: {
        score: idea,
        maxScore: ideaMax,
        feedback: `Estimated from ${stats.wordCount} words and ${stats.impactHits} impact keyword mentions.`,
      },
      technical: {
        score: technical,
        maxScore: technicalMax,
        feedback: `Estimated from ${stats.technicalHits} technical keyword mentions.`,
      },
      tools: { score: tools, maxScore: toolsMax, feedback: toolsFeedback },
      presentation: {
        score: presentation,
        maxScore: presentationMax,
        feedback: `Speaking rate ${wpm} wpm with ${stats.demoHits} demo keyword mentions.`,
      },
    },
    summary: `Heuristic estimate: ${stats.wordCount} words over ${Math.round(stats.durationSeconds)}s (${wpm} wpm).`,
    stats,
  };
}
