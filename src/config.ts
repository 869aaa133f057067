// Environment configuration, validated once at startup.

import { z } from "zod";
import { CATEGORY_NAMES } from "./types.js";
import type { CategoryName } from "./types.js";
import type { LogLevel } from "./logger.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const requiredKey = (name: string) =>
  z.string({ required_error: `${name} is not set. Add it to your .env file.` }).min(1);

const EnvSchema = z.object({
  PORT: positiveInt.default(3000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  OPENAI_API_KEY: requiredKey("OPENAI_API_KEY"),
  DEEPGRAM_API_KEY: requiredKey("DEEPGRAM_API_KEY"),
  BLOB_SIGNING_SECRET: requiredKey("BLOB_SIGNING_SECRET").min(16, "BLOB_SIGNING_SECRET must be at least 16 characters."),
  ANALYSIS_MODEL: z.string().min(1).default("gpt-4o"),
  TRANSCRIPTION_MODEL: z.string().min(1).default("gpt-4o-transcribe"),
  DATA_DIR: z.string().min(1).default("data"),
  TRANSCRIPTION_TIMEOUT_MS: positiveInt.default(30000),
  TIER_TIMEOUT_MS: positiveInt.default(20000),
  CONCURRENT_SCORING: z.enum(["join", "reject"]).default("join"),
  AUTO_SCORE_ON_COMPLETE: booleanFlag.default("true"),
  TIE_BREAK_CATEGORY: z.enum(CATEGORY_NAMES).default("presentation"),
  STORAGE_RETRY_ATTEMPTS: positiveInt.default(3),
  STORAGE_RETRY_BASE_MS: positiveInt.default(50),
  SPONSOR_TOOLS: commaList.default(""),
});

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  openaiApiKey: string;
  deepgramApiKey: string;
  blobSigningSecret: string;
  analysisModel: string;
  transcriptionModel: string;
  dataDir: string;
  transcriptionTimeoutMs: number;
  tierTimeoutMs: number;
  concurrentScoring: "join" | "reject";
  autoScoreOnComplete: boolean;
  tieBreakCategory: CategoryName;
  storageRetry: { attempts: number; baseDelayMs: number };
  sponsorTools: string[];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parses and validates the environment. Empty strings count as unset so a
 * blank line in .env falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    openaiApiKey: e.OPENAI_API_KEY,
    deepgramApiKey: e.DEEPGRAM_API_KEY,
    blobSigningSecret: e.BLOB_SIGNING_SECRET,
    analysisModel: e.ANALYSIS_MODEL,
    transcriptionModel: e.TRANSCRIPTION_MODEL,
    dataDir: e.DATA_DIR,
    transcriptionTimeoutMs: e.TRANSCRIPTION_TIMEOUT_MS,
    tierTimeoutMs: e.TIER_TIMEOUT_MS,
    concurrentScoring: e.CONCURRENT_SCORING,
    autoScoreOnComplete: e.AUTO_SCORE_ON_COMPLETE,
    tieBreakCategory: e.TIE_BREAK_CATEGORY,
    storageRetry: { attempts: e.STORAGE_RETRY_ATTEMPTS, baseDelayMs: e.STORAGE_RETRY_BASE_MS },
    sponsorTools: e.SPONSOR_TOOLS,
  };
}
