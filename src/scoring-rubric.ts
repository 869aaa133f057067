// Pitch Scoring Pipeline - Scoring rubric
// The four judged categories and the prompts sent to the analysis capability.

import { CATEGORY_NAMES } from "./types.js";
import type { CategoryName } from "./types.js";

export interface CategoryDefinition {
  name: CategoryName;
  label: string;
  maxScore: number;
  criteria: string;
}

export const RUBRIC: Record<CategoryName, CategoryDefinition> = {
  idea: {
    name: "idea",
    label: "Idea",
    maxScore: 25,
    criteria:
      "Unique value proposition delivered by a vertical-specific agent using advanced reasoning, action and tool use.",
  },
  technical: {
    name: "technical",
    label: "Technical Implementation",
    maxScore: 25,
    criteria: "Surprises and inspires the judges through novel use of tools in a unique way.",
  },
  tools: {
    name: "tools",
    label: "Tool Use",
    maxScore: 25,
    criteria: "Integrates at least 3 sponsor tools to enable sophisticated agentic behavior.",
  },
  presentation: {
    name: "presentation",
    label: "Presentation Delivery",
    maxScore: 25,
    criteria: "Presents a live demo within 3 minutes that clearly demonstrates the agent's impact.",
  },
};

export const MAX_TOTAL = CATEGORY_NAMES.reduce((sum, name) => sum + RUBRIC[name].maxScore, 0);

/** Fixed rubric description used when no rubric documents are indexed. */
export function rubricText(): string {
  return CATEGORY_NAMES.map((name, i) => {
    const category = RUBRIC[name];
    return `${i + 1}. ${category.label} (${name}, 0-${category.maxScore}): ${category.criteria}`;
  }).join("\n");
}

const SYSTEM_PROMPT = `You are an expert judge for a live pitch competition. Score the pitch strictly against the rubric.
Respond with ONLY a JSON object, no markdown and no text outside it, in this shape:
{
  "idea": { "score": number, "feedback": string },
  "technical": { "score": number, "feedback": string },
  "tools": { "score": number, "feedback": string },
  "presentation": { "score": number, "feedback": string },
  "overall": { "total_score": number, "summary": string }
}
Each category score is between 0 and its maximum. total_score is the sum of the four category scores.`;

export interface PitchContext {
  teamName: string;
  title: string;
  transcript: string;
  sponsorTools: string[];
  focusAreas: string[];
}

function contextLines(context: PitchContext): string[] {
  const lines = [`TEAM: ${context.teamName}`, `TITLE: ${context.title}`];
  if (context.sponsorTools.length > 0) {
    lines.push(`SPONSOR TOOLS: ${context.sponsorTools.join(", ")}`);
  }
  if (context.focusAreas.length > 0) {
    lines.push(`FOCUS AREAS: ${context.focusAreas.join(", ")}`);
  }
  return lines;
}

export interface ScoringPrompt {
  system: string;
  user: string;
}

/** Prompt with the fixed rubric embedded. */
export function buildStructuredPrompt(context: PitchContext): ScoringPrompt {
  const user = [
    ...contextLines(context),
    "",
    "RUBRIC:",
    rubricText(),
    "",
    "TRANSCRIPT:",
    context.transcript || "(empty transcript)",
  ].join("\n");
  return { system: SYSTEM_PROMPT, user };
}

/** Prompt grounded in retrieved rubric passages and the indexed transcript. */
export function buildRagPrompt(
  context: PitchContext,
  rubricPassages: string[],
  indexedTranscript: string | null,
): ScoringPrompt {
  const lines = [
    ...contextLines(context),
    "",
    "RUBRIC (retrieved for this event; cite it in your feedback):",
    ...rubricPassages.map((passage, i) => `[${i + 1}] ${passage}`),
    "",
    "CATEGORY MAXIMUMS:",
    ...CATEGORY_NAMES.map((name) => `- ${name}: ${RUBRIC[name].maxScore}`),
  ];
  if (indexedTranscript !== null && indexedTranscript !== context.transcript) {
    lines.push("", "INDEXED TRANSCRIPT:", indexedTranscript);
  }
  lines.push("", "LIVE TRANSCRIPT:", context.transcript || "(empty transcript)");
  return { system: SYSTEM_PROMPT, user: lines.join("\n") };
}
