// Zod schemas for everything that crosses a storage or process boundary.
// Each schema is pinned to its interface so the two cannot drift apart.

import { z } from "zod";
import { SessionStatus } from "./types.js";
import type {
  BlobHandle,
  CategoryScore,
  DocumentType,
  RetrievalDocument,
  ScoreRecord,
  Session,
  TranscriptSegment,
} from "./types.js";

export const TranscriptSegmentSchema: z.ZodType<TranscriptSegment> = z
  .object({
    text: z.string(),
    startOffset: z.number().finite().min(0),
    endOffset: z.number().finite().min(0),
    confidence: z.number().min(0).max(1),
    isFinal: z.boolean(),
  })
  .refine((segment) => segment.endOffset >= segment.startOffset, {
    message: "endOffset must not be before startOffset",
    path: ["endOffset"],
  });

export const BlobHandleSchema: z.ZodType<BlobHandle> = z.object({
  tenantId: z.string().min(1),
  blobId: z.string().min(1),
  contentType: z.string(),
  size: z.number().int().min(0),
  createdAt: z.string(),
});

export const SessionSchema: z.ZodType<Session> = z.object({
  id: z.string().min(1),
  tenantId: z.string().min(1),
  teamName: z.string(),
  title: z.string(),
  status: z.nativeEnum(SessionStatus),
  createdAt: z.string(),
  updatedAt: z.string(),
  recordingStartedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  audioRef: BlobHandleSchema.nullable(),
  transcript: z
    .object({
      segments: z.array(TranscriptSegmentSchema),
      totalText: z.string(),
    })
    .nullable(),
  error: z.object({ reason: z.string(), at: z.string() }).nullable(),
  channelId: z.string().nullable(),
  scoringTriggeredAt: z.string().nullable(),
});

const ScoringMethodSchema = z.enum(["rag_enhanced", "structured_llm", "heuristic"]);

export const DocumentTypeSchema: z.ZodType<DocumentType> = z.enum(["rubric", "transcript", "team_profile"]);

const CategoryScoreSchema: z.ZodType<CategoryScore> = z.object({
  score: z.number().finite().min(0),
  maxScore: z.number().finite().positive(),
  feedback: z.string(),
});

export const ScoreRecordSchema: z.ZodType<ScoreRecord> = z.object({
  tenantId: z.string().min(1),
  sessionId: z.string().min(1),
  teamName: z.string(),
  title: z.string(),
  judgeId: z.string().nullable(),
  categories: z.object({
    idea: CategoryScoreSchema,
    technical: CategoryScoreSchema,
    tools: CategoryScoreSchema,
    presentation: CategoryScoreSchema,
  }),
  overall: z.object({
    totalScore: z.number().finite(),
    maxTotal: z.number().finite(),
    summary: z.string(),
  }),
  methodUsed: ScoringMethodSchema,
  scoredAt: z.string(),
  scoringContextRef: z
    .array(
      z.object({
        docId: z.string(),
        documentType: DocumentTypeSchema,
        similarity: z.number(),
      }),
    )
    .nullable(),
  tierFailures: z.array(z.object({ tier: ScoringMethodSchema, reason: z.string() })),
});

export const DocumentMetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const RetrievalDocumentSchema: z.ZodType<RetrievalDocument> = z.object({
  docId: z.string().min(1),
  tenantId: z.string().min(1),
  documentType: DocumentTypeSchema,
  text: z.string(),
  embedding: z.array(z.number()),
  metadata: DocumentMetadataSchema,
  indexedAt: z.string(),
  seq: z.number().int(),
});
