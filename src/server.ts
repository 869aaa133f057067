// Pitch Scoring Pipeline - Express server and audio WebSocket
// A thin translation layer: JSON routes under /tenants/:tenantId/... map onto
// the pipeline facade, and /tenants/:tenantId/sessions/:sessionId/audio
// streams PCM audio in and live transcript segments out.

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { z } from "zod";
import type { BlobStore } from "./blob-store.js";
import type { ErrorKind, PublicError } from "./errors.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { PipelineResult, ScoringPipeline } from "./pipeline.js";
import { BlobHandleSchema, DocumentMetadataSchema, DocumentTypeSchema, TranscriptSegmentSchema } from "./schemas.js";
import { CATEGORY_NAMES } from "./types.js";
import type { Session, TranscriptSegment } from "./types.js";

// ─── Error mapping ──────────────────────────────────────────────────────────────

export const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidInput: 400,
  NotFound: 404,
  IndexEmpty: 404,
  InvalidTransition: 409,
  AlreadyScoring: 409,
  Cancelled: 499,
  Internal: 500,
  AnalysisCapabilityError: 502,
  StorageUnavailable: 503,
};

function sendError(res: Response, error: PublicError): void {
  res.status(STATUS_BY_KIND[error.kind]).json({ error });
}

function sendResult<T>(res: Response, result: PipelineResult<T>, status = 200): void {
  if (result.ok) {
    res.status(status).json(result.value ?? null);
  } else {
    sendError(res, result.error);
  }
}

function invalidInput(res: Response, issues: z.ZodIssue[]): void {
  const reason = issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
  sendError(res, { kind: "InvalidInput", reason });
}

// ─── Request schemas ────────────────────────────────────────────────────────────

const CreateSessionBody = z.object({
  teamName: z.string().trim().min(1),
  title: z.string().trim().min(1),
});

const CompleteBody = z.object({ finalAudioRef: BlobHandleSchema.optional() });

const FailBody = z.object({ reason: z.string().trim().min(1) });

const ScoreBody = z.object({
  judgeId: z.string().min(1).optional(),
  sponsorTools: z.array(z.string()).optional(),
  focusAreas: z.array(z.string()).optional(),
});

const ToolAnalysisBody = z.object({
  sponsorTools: z.array(z.string().trim().min(1)).optional(),
});

const CompareBody = z.object({
  sessionIds: z.array(z.string().min(1)).min(2).max(10),
  criteria: z.array(z.string().trim().min(1)).optional(),
});

const IndexDocumentBody = z.object({
  documentType: DocumentTypeSchema,
  text: z.string().min(1),
  metadata: DocumentMetadataSchema.optional(),
});

const QueryDocumentsBody = z.object({
  documentType: DocumentTypeSchema,
  query: z.string().min(1),
  topK: z.number().int().min(0).max(50).default(5),
});

const SortKeySchema = z.union([z.literal("total_score"), z.enum(CATEGORY_NAMES)]);

const LeaderboardQuery = z.object({
  sortKey: SortKeySchema.optional(),
  tieBreak: z.enum(CATEGORY_NAMES).optional(),
});

const AudioUrlQuery = z.object({
  ttl: z.coerce.number().int().positive().max(86_400).default(900),
});

const ControlMessage = z.discriminatedUnion("type", [
  z.object({ type: z.literal("begin") }),
  z.object({ type: z.literal("complete") }),
]);

// ─── WebSocket messages ─────────────────────────────────────────────────────────

export type AudioSocketMessage =
  | { type: "segment"; segment: TranscriptSegment }
  | { type: "session"; session: Session }
  | { type: "error"; error: PublicError };

export function sendMessage(ws: WebSocket, message: AudioSocketMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

const AUDIO_PATH = /^\/tenants\/([^/]+)\/sessions\/([^/]+)\/audio\/?$/;

// ─── Server factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  pipeline: ScoringPipeline;
  blobs: BlobStore;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Resolves when listening. */
  listen(port: number): Promise<void>;
  /** Closes every socket, then the HTTP server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server and WebSocket server without
 * listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { pipeline, blobs } = options;
  const logger = options.logger ?? silentLogger;

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ─── Sessions ─────────────────────────────────────────────────────────────────

  app.post("/tenants/:tenantId/sessions", async (req, res) => {
    const body = CreateSessionBody.safeParse(req.body);
    if (!body.success) return invalidInput(res, body.error.issues);
    sendResult(res, await pipeline.createSession(req.params.tenantId, body.data.teamName, body.data.title), 201);
  });

  app.get("/tenants/:tenantId/sessions", async (req, res) => {
    sendResult(res, await pipeline.listSessions(req.params.tenantId));
  });

  app.get("/tenants/:tenantId/sessions/:sessionId", async (req, res) => {
    sendResult(res, await pipeline.getSession(req.params.tenantId, req.params.sessionId));
  });

  app.post("/tenants/:tenantId/sessions/:sessionId/begin", async (req, res) => {
    sendResult(res, await pipeline.beginRecording(req.params.tenantId, req.params.sessionId));
  });

  app.post("/tenants/:tenantId/sessions/:sessionId/segments", async (req, res) => {
    const body = TranscriptSegmentSchema.safeParse(req.body);
    if (!body.success) return invalidInput(res, body.error.issues);
    sendResult(res, await pipeline.ingestSegment(req.params.tenantId, req.params.sessionId, body.data));
  });

  app.post("/tenants/:tenantId/sessions/:sessionId/complete", async (req, res) => {
    const body = CompleteBody.safeParse(req.body ?? {});
    if (!body.success) return invalidInput(res, body.error.issues);
    sendResult(
      res,
      await pipeline.completeSession(req.params.tenantId, req.params.sessionId, body.data.finalAudioRef),
    );
  });

  app.post("/tenants/:tenantId/sessions/:sessionId/fail", async (req, res) => {
    const body = FailBody.safeParse(req.body);
    if (!body.success) return invalidInput(res, body.error.issues);
    sendResult(res, await pipeline.failSession(req.params.tenantId, req.params.sessionId, body.data.reason));
  });

  app.get("/tenants/:tenantId/sessions/:sessionId/audio-url", async (req, res) => {
    const query = AudioUrlQuery.safeParse(req.query);
    if (!query.success) return invalidInput(res, query.error.issues);
    sendResult(res, await pipeline.signAudio(req.params.tenantId, req.params.sessionId, query.data.ttl));
  });

  // ─── Scoring and ranking ──────────────────────────────────────────────────────

  app.post("/tenants/:tenantId/sessions/:sessionId/score", async (req, res) => {
    const body = ScoreBody.safeParse(req.body ?? {});
    if (!body.success) return invalidInput(res, body.error.issues);

    // A client that hangs up cancels its scoring run
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    sendResult(
      res,
      await pipeline.scoreSession(req.params.tenantId, req.params.sessionId, {
        ...body.data,
        signal: controller.signal,
      }),
    );
  });

  app.get("/tenants/:tenantId/sessions/:sessionId/score", async (req, res) => {
    sendResult(res, await pipeline.getScore(req.params.tenantId, req.params.sessionId));
  });

  app.get("/tenants/:tenantId/sessions/:sessionId/rank", async (req, res) => {
    const query = LeaderboardQuery.safeParse(req.query);
    if (!query.success) return invalidInput(res, query.error.issues);
    sendResult(
      res,
      await pipeline.teamRank(req.params.tenantId, req.params.sessionId, {
        sortKey: query.data.sortKey,
        tieBreakCategory: query.data.tieBreak,
      }),
    );
  });

  app.get("/tenants/:tenantId/leaderboard", async (req, res) => {
    const query = LeaderboardQuery.safeParse(req.query);
    if (!query.success) return invalidInput(res, query.error.issues);
    sendResult(
      res,
      await pipeline.rankTenant(req.params.tenantId, {
        sortKey: query.data.sortKey,
        tieBreakCategory: query.data.tieBreak,
      }),
    );
  });

  app.get("/tenants/:tenantId/leaderboard/stats", async (req, res) => {
    sendResult(res, await pipeline.leaderboardStats(req.params.tenantId));
  });

  // ─── Pitch analysis ───────────────────────────────────────────────────────────

  app.post("/tenants/:tenantId/sessions/:sessionId/tool-analysis", async (req, res) => {
    const body = ToolAnalysisBody.safeParse(req.body ?? {});
    if (!body.success) return invalidInput(res, body.error.issues);
    sendResult(res, await pipeline.analyzeToolUsage(req.params.tenantId, req.params.sessionId, body.data));
  });

  app.post("/tenants/:tenantId/comparisons", async (req, res) => {
    const body = CompareBody.safeParse(req.body);
    if (!body.success) return invalidInput(res, body.error.issues);
    sendResult(
      res,
      await pipeline.comparePitches(req.params.tenantId, body.data.sessionIds, { criteria: body.data.criteria }),
    );
  });

  // ─── Retrieval ────────────────────────────────────────────────────────────────

  app.post("/tenants/:tenantId/documents", async (req, res) => {
    const body = IndexDocumentBody.safeParse(req.body);
    if (!body.success) return invalidInput(res, body.error.issues);
    const result = await pipeline.indexDocument(
      req.params.tenantId,
      body.data.documentType,
      body.data.text,
      body.data.metadata,
    );
    if (result.ok) {
      res.status(201).json({ docId: result.value });
    } else {
      sendError(res, result.error);
    }
  });

  app.post("/tenants/:tenantId/documents/query", async (req, res) => {
    const body = QueryDocumentsBody.safeParse(req.body);
    if (!body.success) return invalidInput(res, body.error.issues);
    const result = await pipeline.queryDocuments(
      req.params.tenantId,
      body.data.documentType,
      body.data.query,
      body.data.topK,
    );
    if (result.ok) {
      // Vectors stay server-side
      res.json(
        result.value.map((hit) => ({
          docId: hit.document.docId,
          documentType: hit.document.documentType,
          text: hit.document.text,
          metadata: hit.document.metadata,
          similarity: hit.similarity,
        })),
      );
    } else {
      sendError(res, result.error);
    }
  });

  // ─── Signed audio download ────────────────────────────────────────────────────

  app.get("/blobs", async (req, res) => {
    const handle = blobs.verify(`http://local${req.originalUrl}`);
    if (!handle) {
      return sendError(res, { kind: "NotFound", reason: "Link is invalid or has expired" });
    }
    try {
      const bytes = await blobs.read(handle.tenantId, handle);
      res.type(handle.contentType).send(bytes);
    } catch (err) {
      logger.warn("Signed blob read failed", { blobId: handle.blobId, error: errorMessage(err) });
      sendError(res, { kind: "NotFound", reason: "Blob not found" });
    }
  });

  // Malformed JSON bodies and anything else express raises
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return sendError(res, { kind: "InvalidInput", reason: "Request body is not valid JSON" });
    }
    logger.error("Unhandled request error", { error: errorMessage(err) });
    sendError(res, { kind: "Internal", reason: "Internal error" });
  });

  // ─── Audio WebSocket ──────────────────────────────────────────────────────────

  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const match = AUDIO_PATH.exec(new URL(req.url ?? "/", "http://local").pathname);
    if (!match) {
      ws.close(1008, "Unknown path");
      return;
    }
    handleAudioConnection(ws, decodeURIComponent(match[1]), decodeURIComponent(match[2]), pipeline, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info("Server listening", { port });
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── Audio connection handler ───────────────────────────────────────────────────

function handleAudioConnection(
  ws: WebSocket,
  tenantId: string,
  sessionId: string,
  pipeline: ScoringPipeline,
  logger: Logger,
): void {
  const unsubscribe = pipeline.subscribeSegments(tenantId, sessionId, (segment) => {
    sendMessage(ws, { type: "segment", segment });
  });
  logger.info("Audio socket connected", { tenantId, sessionId });

  ws.on("message", (data: RawData, isBinary: boolean) => {
    void handleSocketMessage(ws, tenantId, sessionId, toBuffer(data), isBinary, pipeline).catch((err: unknown) => {
      logger.error("Audio socket message failed", { tenantId, sessionId, error: errorMessage(err) });
      sendMessage(ws, { type: "error", error: { kind: "Internal", reason: "Internal error" } });
    });
  });

  ws.on("close", () => {
    unsubscribe();
    logger.info("Audio socket closed", { tenantId, sessionId });
  });
}

async function handleSocketMessage(
  ws: WebSocket,
  tenantId: string,
  sessionId: string,
  data: Buffer,
  isBinary: boolean,
  pipeline: ScoringPipeline,
): Promise<void> {
  if (isBinary) {
    // LINEAR16: two bytes per sample
    if (data.length % 2 !== 0) {
      sendMessage(ws, { type: "error", error: { kind: "InvalidInput", reason: "Audio frames must be 16-bit aligned" } });
      return;
    }
    const result = await pipeline.feedAudio(tenantId, sessionId, data);
    if (!result.ok) sendMessage(ws, { type: "error", error: result.error });
    return;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(data.toString("utf-8"));
  } catch {
    sendMessage(ws, { type: "error", error: { kind: "InvalidInput", reason: "Control message is not valid JSON" } });
    return;
  }
  const message = ControlMessage.safeParse(payload);
  if (!message.success) {
    sendMessage(ws, { type: "error", error: { kind: "InvalidInput", reason: "Unknown control message" } });
    return;
  }

  const result =
    message.data.type === "begin"
      ? await pipeline.beginRecording(tenantId, sessionId)
      : await pipeline.completeSession(tenantId, sessionId);
  if (result.ok) {
    sendMessage(ws, { type: "session", session: result.value });
  } else {
    sendMessage(ws, { type: "error", error: result.error });
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
