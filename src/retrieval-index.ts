// Pitch Scoring Pipeline - Retrieval Index
// Per-tenant, per-document-type vector index over the Tenant Store. An index
// exists implicitly once its first document is stored. Queries are a full
// scan of the tenant's documents of one type; event sizes keep that small.

import { v4 as uuidv4 } from "uuid";
import type { AnalysisCallOptions, AnalysisGateway } from "./analysis-gateway.js";
import { PipelineError } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { Keys } from "./tenant-store.js";
import type { TenantStore } from "./tenant-store.js";
import { DOCUMENT_TYPES } from "./types.js";
import type { DocumentMetadata, DocumentType, RetrievalDocument, RetrievalHit } from "./types.js";

/**
 * Cosine similarity between two vectors. Mismatched lengths, empty vectors
 * and zero vectors all give 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Scales to unit length. A zero vector is returned unchanged. */
export function normalizeVector(vector: number[]): number[] {
  let norm = 0;
  for (const v of vector) norm += v * v;
  if (norm === 0) return [...vector];
  const length = Math.sqrt(norm);
  return vector.map((v) => v / length);
}

/** Most recent first: later indexedAt, then higher seq. */
function compareRecency(a: RetrievalDocument, b: RetrievalDocument): number {
  if (a.indexedAt !== b.indexedAt) return a.indexedAt < b.indexedAt ? 1 : -1;
  return b.seq - a.seq;
}

export interface RetrievalIndexOptions {
  store: TenantStore;
  analysis: AnalysisGateway;
  logger?: Logger;
  now?: () => Date;
}

export class RetrievalIndex {
  private readonly store: TenantStore;
  private readonly analysis: AnalysisGateway;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private seq = 0;

  constructor(options: RetrievalIndexOptions) {
    this.store = options.store;
    this.analysis = options.analysis;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /** Embeds and stores `text`. Documents are immutable once stored. */
  async index(
    tenantId: string,
    documentType: DocumentType,
    text: string,
    metadata: DocumentMetadata = {},
    options: AnalysisCallOptions = {},
  ): Promise<string> {
    assertDocumentType(documentType);
    if (text.trim().length === 0) {
      throw new PipelineError("InvalidInput", "Document text must not be empty");
    }

    const embedding = normalizeVector(await this.analysis.embed(text, options));
    const document: RetrievalDocument = {
      docId: uuidv4(),
      tenantId,
      documentType,
      text,
      embedding,
      metadata: { ...metadata },
      indexedAt: this.now().toISOString(),
      seq: ++this.seq,
    };

    await this.store.put(tenantId, Keys.index(documentType, document.docId), document);
    this.logger.info("Indexed document", { tenantId, documentType, docId: document.docId });
    return document.docId;
  }

  /**
   * Indexes a session transcript as a new version. Earlier versions are kept
   * for audit; the latest is found by `latestTranscript`.
   */
  async indexTranscript(
    tenantId: string,
    sessionId: string,
    text: string,
    metadata: DocumentMetadata = {},
  ): Promise<{ docId: string; version: number }> {
    const previous = await this.transcriptVersions(tenantId, sessionId);
    const version = previous.length === 0 ? 1 : versionOf(previous[previous.length - 1]) + 1;
    const docId = await this.index(tenantId, "transcript", text, { ...metadata, sessionId, version });
    return { docId, version };
  }

  /**
   * Nearest neighbours by cosine similarity, descending. An empty index gives
   * [] without calling the embedder.
   */
  async query(
    tenantId: string,
    documentType: DocumentType,
    queryText: string,
    topK: number,
    options: AnalysisCallOptions = {},
  ): Promise<RetrievalHit[]> {
    assertDocumentType(documentType);
    if (!Number.isFinite(topK) || topK <= 0) {
      return [];
    }

    const documents = await this.listDocuments(tenantId, documentType);
    if (documents.length === 0) {
      return [];
    }

    const queryVector = normalizeVector(await this.analysis.embed(queryText, options));
    const hits: RetrievalHit[] = documents.map((document) => ({
      document,
      similarity: cosineSimilarity(queryVector, document.embedding),
    }));

    hits.sort((a, b) => {
      if (b.similarity !== a.similarity) return b.similarity - a.similarity;
      return compareRecency(a.document, b.document);
    });

    return hits.slice(0, Math.floor(topK));
  }

  /** All documents of one type for the tenant, oldest first. */
  async listDocuments(tenantId: string, documentType: DocumentType): Promise<RetrievalDocument[]> {
    assertDocumentType(documentType);
    const documents: RetrievalDocument[] = [];
    for await (const entry of this.store.scanPrefix(tenantId, "index", documentType)) {
      if (entry.value.tenantId === tenantId) {
        documents.push(entry.value);
      }
    }
    return documents.sort((a, b) => compareRecency(b, a));
  }

  async latestTranscript(tenantId: string, sessionId: string): Promise<RetrievalDocument | null> {
    const versions = await this.transcriptVersions(tenantId, sessionId);
    return versions.length > 0 ? versions[versions.length - 1] : null;
  }

  /** Transcript documents of one session, by ascending version. */
  private async transcriptVersions(tenantId: string, sessionId: string): Promise<RetrievalDocument[]> {
    const documents = await this.listDocuments(tenantId, "transcript");
    return documents
      .filter((doc) => doc.metadata.sessionId === sessionId)
      .sort((a, b) => versionOf(a) - versionOf(b) || compareRecency(b, a));
  }
}

function versionOf(document: RetrievalDocument): number {
  const version = document.metadata.version;
  return typeof version === "number" ? version : 0;
}

function assertDocumentType(documentType: string): void {
  if (!DOCUMENT_TYPES.some((type) => type === documentType)) {
    throw new PipelineError("InvalidInput", `Unknown document type: ${documentType}`);
  }
}
