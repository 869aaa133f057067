// Pitch Scoring Pipeline - Analysis Capability Gateway
// Structured completions (JSON mode, validated with zod) and text embeddings
// over the OpenAI API. Every failure is an AnalysisCapabilityError with the
// stage it happened at, so the scoring fallback chain can log it precisely.

import type { z } from "zod";
import { AnalysisCapabilityError, errorMessage, isPipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

/** Fixed so that stored vectors and query vectors always come from the same model. */
export const EMBEDDING_MODEL = "text-embedding-3-small";

export interface AnalysisPrompt {
  system: string;
  user: string;
}

export interface AnalysisCallOptions {
  signal?: AbortSignal;
}

export interface AnalysisGateway {
  complete<T>(prompt: AnalysisPrompt, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: AnalysisCallOptions): Promise<T>;
  embed(text: string, options?: AnalysisCallOptions): Promise<number[]>;
}

// ─── OpenAI client surface ──────────────────────────────────────────────────────

export interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: "system" | "user"; content: string }>;
  response_format?: { type: "json_object" };
  temperature?: number;
}

export interface OpenAIAnalysisClient {
  chat: {
    completions: {
      create(
        params: ChatCompletionRequest,
        options?: { signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
  embeddings: {
    create(
      params: { model: string; input: string },
      options?: { signal?: AbortSignal },
    ): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

// ─── JSON extraction ────────────────────────────────────────────────────────────

const SNIPPET_MAX = 200;

export function snippet(text: string): string {
  const s = text.trim();
  return s.length <= SNIPPET_MAX ? s : `${s.slice(0, SNIPPET_MAX)}...`;
}

function stripMarkdownFences(text: string): string {
  const s = text.trim();
  const fenced = /^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/.exec(s);
  if (fenced) return fenced[1].trim();
  const open = s.indexOf("```");
  if (open >= 0) {
    const after = s.slice(open + 3).replace(/^json\s*/, "");
    const close = after.indexOf("```");
    return (close >= 0 ? after.slice(0, close) : after).trim();
  }
  return s;
}

/**
 * Returns the first complete JSON object or array in `text`, tolerating
 * markdown fences and prose around it. Tracks string mode so braces inside
 * string literals do not count.
 *
 * @throws Error when no balanced JSON value is present.
 */
export function extractFirstJsonValue(text: string): string {
  const stripped = stripMarkdownFences(text);
  const first = stripped[0];
  if (first === "{" || first === "[") {
    try {
      JSON.parse(stripped);
      return stripped;
    } catch {
      // not a whole-document value; scan for the first balanced one below
    }
  }

  const objStart = stripped.indexOf("{");
  const arrStart = stripped.indexOf("[");
  if (objStart < 0 && arrStart < 0) {
    throw new Error("No JSON object or array found");
  }
  const start = arrStart < 0 || (objStart >= 0 && objStart < arrStart) ? objStart : arrStart;

  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < stripped.length; i++) {
    const c = stripped[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (inString) {
      if (c === "\\") escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === "{" || c === "[") depth++;
    else if (c === "}" || c === "]") {
      depth--;
      if (depth === 0) return stripped.slice(start, i + 1);
    }
  }
  throw new Error("Incomplete JSON (unbalanced braces)");
}

/** Parses and validates a raw model reply. */
export function parseStructuredReply<T>(raw: string | null | undefined, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (raw === null || raw === undefined || raw.trim().length === 0) {
    throw new AnalysisCapabilityError("empty_response", "Model returned an empty reply");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extractFirstJsonValue(raw));
  } catch (err) {
    throw new AnalysisCapabilityError("parse", `${errorMessage(err)}. Output: ${snippet(raw)}`, { cause: err });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new AnalysisCapabilityError("validation", `${issues}. Output: ${snippet(raw)}`, { cause: result.error });
  }
  return result.data;
}

// ─── OpenAI implementation ──────────────────────────────────────────────────────

export interface OpenAIAnalysisGatewayOptions {
  client: OpenAIAnalysisClient;
  model?: string;
  temperature?: number;
  logger?: Logger;
}

export class OpenAIAnalysisGateway implements AnalysisGateway {
  private readonly client: OpenAIAnalysisClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly logger: Logger;

  constructor(options: OpenAIAnalysisGatewayOptions) {
    this.client = options.client;
    this.model = options.model ?? "gpt-4o";
    this.temperature = options.temperature ?? 0.2;
    this.logger = options.logger ?? silentLogger;
  }

  async complete<T>(prompt: AnalysisPrompt, schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: AnalysisCallOptions = {}): Promise<T> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: "system", content: prompt.system },
            { role: "user", content: prompt.user },
          ],
          response_format: { type: "json_object" },
          temperature: this.temperature,
        },
        { signal: options.signal },
      );
      content = response.choices[0]?.message.content;
    } catch (err) {
      throw toProviderError("chat completion", err);
    }

    const value = parseStructuredReply(content, schema);
    this.logger.debug("Structured completion validated", { model: this.model });
    return value;
  }

  async embed(text: string, options: AnalysisCallOptions = {}): Promise<number[]> {
    let embedding: number[] | undefined;
    try {
      const response = await this.client.embeddings.create(
        { model: EMBEDDING_MODEL, input: text },
        { signal: options.signal },
      );
      embedding = response.data[0]?.embedding;
    } catch (err) {
      throw toProviderError("embedding", err);
    }

    if (!embedding || embedding.length === 0) {
      throw new AnalysisCapabilityError("empty_response", "Embedding response contained no vector");
    }
    return embedding;
  }
}

function toProviderError(call: string, err: unknown): AnalysisCapabilityError {
  if (err instanceof AnalysisCapabilityError) return err;
  const detail = isPipelineError(err) ? err.reason : errorMessage(err);
  return new AnalysisCapabilityError("provider", `${call} failed: ${detail}`, { cause: err });
}
