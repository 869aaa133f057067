// Pitch Scoring Pipeline - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { join } from "node:path";
import { OpenAIAnalysisGateway } from "./analysis-gateway.js";
import type { OpenAIAnalysisClient } from "./analysis-gateway.js";
import { FileBlobStore } from "./blob-store.js";
import { ConfigError, loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { ScoringPipeline } from "./pipeline.js";
import { PitchAnalyzer } from "./pitch-analysis.js";
import { RankingEngine } from "./ranking-engine.js";
import { RetrievalIndex } from "./retrieval-index.js";
import { ScoringOrchestrator } from "./scoring-orchestrator.js";
import { FallbackChain, HeuristicTier, RagEnhancedTier, StructuredLlmTier } from "./scoring-tiers.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { FileBackend, TenantStore } from "./tenant-store.js";
import { DeepgramTranscriptionGateway } from "./transcription-engine.js";
import type { OpenAITranscriptionClient } from "./transcription-engine.js";

export const APP_NAME = "Pitch Scoring Pipeline";
export const APP_VERSION = "0.1.0";

const log = createLogger("Init");

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    for (const issue of err.issues) log.error(issue);
    process.exit(1);
  }
  throw err;
}

const logger = createLogger("Pipeline", { level: config.logLevel });
logger.info(`${APP_NAME} v${APP_VERSION} starting`, { dataDir: config.dataDir });

// ─── API clients ────────────────────────────────────────────────────────────────

const deepgramClient = createDeepgramClient(config.deepgramApiKey);
const openai = new OpenAI({ apiKey: config.openaiApiKey });

// The SDK's overloaded methods are narrowed to the surfaces the gateways use.
const transcriptionClient: OpenAITranscriptionClient = {
  audio: {
    transcriptions: {
      async create(params, options) {
        if (params.response_format === "verbose_json") {
          return openai.audio.transcriptions.create({ ...params, response_format: "verbose_json" }, options);
        }
        const result = await openai.audio.transcriptions.create(
          { file: params.file, model: params.model, language: params.language, response_format: "json" },
          options,
        );
        return { text: result.text };
      },
    },
  },
};

const analysisClient: OpenAIAnalysisClient = {
  chat: {
    completions: {
      create: (params, options) => openai.chat.completions.create(params, options),
    },
  },
  embeddings: {
    create: (params, options) => openai.embeddings.create(params, options),
  },
};

// ─── Storage ────────────────────────────────────────────────────────────────────

const store = new TenantStore({
  backend: new FileBackend(join(config.dataDir, "store")),
  retry: config.storageRetry,
  logger: logger.child("TenantStore"),
});

const blobs = new FileBlobStore({
  baseDir: join(config.dataDir, "blobs"),
  signingSecret: config.blobSigningSecret,
  publicBaseUrl: `http://localhost:${config.port}/blobs`,
  retry: config.storageRetry,
  logger: logger.child("BlobStore"),
});

// ─── Pipeline components ────────────────────────────────────────────────────────

const transcription = new DeepgramTranscriptionGateway({
  deepgram: deepgramClient,
  openai: transcriptionClient,
  model: config.transcriptionModel,
  logger: logger.child("Transcription"),
});

const analysis = new OpenAIAnalysisGateway({
  client: analysisClient,
  model: config.analysisModel,
  logger: logger.child("Analysis"),
});

const index = new RetrievalIndex({ store, analysis, logger: logger.child("RetrievalIndex") });

const sessions = new SessionManager({
  store,
  blobs,
  transcription,
  transcriptionTimeoutMs: config.transcriptionTimeoutMs,
  logger: logger.child("SessionManager"),
});

const chainLogger = logger.child("Scoring");
const chain = new FallbackChain(
  [new RagEnhancedTier(index, analysis, chainLogger), new StructuredLlmTier(analysis, chainLogger), new HeuristicTier()],
  { tierTimeoutMs: config.tierTimeoutMs, logger: chainLogger },
);

const orchestrator = new ScoringOrchestrator({
  store,
  sessions,
  chain,
  concurrentScoring: config.concurrentScoring,
  sponsorTools: config.sponsorTools,
  logger: chainLogger,
});

const ranking = new RankingEngine({
  source: orchestrator,
  tieBreakCategory: config.tieBreakCategory,
  logger: logger.child("Ranking"),
});

const analyzer = new PitchAnalyzer({
  sessions,
  analysis,
  sponsorTools: config.sponsorTools,
  logger: logger.child("Analysis"),
});

const pipeline = new ScoringPipeline({
  sessions,
  orchestrator,
  ranking,
  index,
  blobs,
  analyzer,
  autoScoreOnComplete: config.autoScoreOnComplete,
  logger,
});

// ─── Server ─────────────────────────────────────────────────────────────────────

const server = createAppServer({ pipeline, blobs, logger: logger.child("Server") });
await server.listen(config.port);
logger.info(`Open http://localhost:${config.port}/health to check the server`);

async function shutdown(signal: string): Promise<void> {
  logger.info("Shutting down", { signal });
  await server.close();
  await pipeline.drain();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
  });
}
