// Pitch Scoring Pipeline - Tenant Store
// Key-value storage where every key is composed internally as
// "{tenant}:{entity}:{id}" (or "{tenant}:index:{documentType}:{id}").
// Callers never build raw keys, so no operation can reach across tenants.

import { mkdir, readFile, readdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import type { z } from "zod";
import { PipelineError, errorMessage, hasErrorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { withRetry } from "./retry.js";
import { RetrievalDocumentSchema, ScoreRecordSchema, SessionSchema } from "./schemas.js";
import { DOCUMENT_TYPES } from "./types.js";
import type { DocumentType, RetrievalDocument, ScoreRecord, Session } from "./types.js";

// ─── Logical keys ───────────────────────────────────────────────────────────────

export type EntityType = "session" | "score" | "index";

interface EntityValueMap {
  session: Session;
  score: ScoreRecord;
  index: RetrievalDocument;
}

export type EntityValue<E extends EntityType> = EntityValueMap[E];

const ENTITY_SCHEMAS: { [E in EntityType]: z.ZodType<EntityValueMap[E]> } = {
  session: SessionSchema,
  score: ScoreRecordSchema,
  index: RetrievalDocumentSchema,
};

export interface StoreKey<E extends EntityType = EntityType> {
  entity: E;
  id: string;
  /** Document type; present only on index keys. */
  documentType?: DocumentType;
}

export const Keys = {
  session: (id: string): StoreKey<"session"> => ({ entity: "session", id }),
  score: (sessionId: string): StoreKey<"score"> => ({ entity: "score", id: sessionId }),
  index: (documentType: DocumentType, docId: string): StoreKey<"index"> => ({
    entity: "index",
    id: docId,
    documentType,
  }),
};

export interface StoredEntry<E extends EntityType> {
  key: string;
  value: EntityValue<E>;
}

function assertSegment(label: string, value: string): void {
  if (value.length === 0) {
    throw new PipelineError("InvalidInput", `${label} must not be empty`);
  }
  if (value.includes(":")) {
    throw new PipelineError("InvalidInput", `${label} must not contain ':'`);
  }
}

export function composeKey(tenantId: string, key: StoreKey): string {
  assertSegment("tenantId", tenantId);
  assertSegment(`${key.entity} id`, key.id);
  return `${composePrefix(tenantId, key.entity, key.documentType)}${key.id}`;
}

function composePrefix(tenantId: string, entity: EntityType, documentType?: DocumentType): string {
  assertSegment("tenantId", tenantId);
  if (entity === "index") {
    if (documentType === undefined) {
      return `${tenantId}:index:`;
    }
    if (!DOCUMENT_TYPES.includes(documentType)) {
      throw new PipelineError("InvalidInput", `Unknown document type: ${documentType}`);
    }
    return `${tenantId}:index:${documentType}:`;
  }
  if (documentType !== undefined) {
    throw new PipelineError("InvalidInput", `${entity} keys do not take a document type`);
  }
  return `${tenantId}:${entity}:`;
}

// ─── Backends ───────────────────────────────────────────────────────────────────

/**
 * Raw storage underneath the Tenant Store. `get` returns null for absent or
 * expired keys; any other failure should throw.
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  keys(prefix: string): Promise<string[]>;
}

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

export class MemoryBackend implements KeyValueBackend {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds !== undefined ? this.now() + ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    const now = this.now();
    const result: string[] = [];
    for (const [key, entry] of this.entries) {
      if (!key.startsWith(prefix)) continue;
      if (entry.expiresAt !== null && entry.expiresAt <= now) continue;
      result.push(key);
    }
    return result;
  }
}

interface FileRecord {
  key: string;
  value: string;
  expiresAt: number | null;
}

function isFileRecord(value: unknown): value is FileRecord {
  if (typeof value !== "object" || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.key === "string" &&
    typeof record.value === "string" &&
    (record.expiresAt === null || typeof record.expiresAt === "number")
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One JSON file per key under `dir`. Writes go to a temp file first and are
 * renamed into place, so a reader never sees half a record.
 */
export class FileBackend implements KeyValueBackend {
  private readonly dir: string;
  private readonly now: () => number;
  private ready: Promise<void> | null = null;

  constructor(dir: string, options: { now?: () => number } = {}) {
    this.dir = dir;
    this.now = options.now ?? Date.now;
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  private pathFor(key: string): string {
    return join(this.dir, `${encodeURIComponent(key)}.json`);
  }

  async get(key: string): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(key), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isFileRecord(parsed)) {
      throw new Error(`Malformed record file for key ${key}`);
    }
    if (parsed.expiresAt !== null && parsed.expiresAt <= this.now()) {
      await this.del(key);
      return null;
    }
    return parsed.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    await this.ensureDir();
    const record: FileRecord = {
      key,
      value,
      expiresAt: ttlSeconds !== undefined ? this.now() + ttlSeconds * 1000 : null,
    };
    const target = this.pathFor(key);
    const temp = `${target}.${randomUUID()}.tmp`;
    await writeFile(temp, JSON.stringify(record), "utf-8");
    await rename(temp, target);
  }

  async del(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  async keys(prefix: string): Promise<string[]> {
    await this.ensureDir();
    const names = await readdir(this.dir);
    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => decodeURIComponent(name.slice(0, -".json".length)))
      .filter((key) => key.startsWith(prefix));
  }
}

// ─── Tenant Store ───────────────────────────────────────────────────────────────

export interface TenantStoreOptions {
  backend: KeyValueBackend;
  retry?: { attempts: number; baseDelayMs: number };
  logger?: Logger;
  /** Replaces the backoff sleep in tests. */
  sleep?: (ms: number) => Promise<void>;
}

export class TenantStore {
  private readonly backend: KeyValueBackend;
  private readonly retry: { attempts: number; baseDelayMs: number };
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: TenantStoreOptions) {
    this.backend = options.backend;
    this.retry = options.retry ?? { attempts: 3, baseDelayMs: 50 };
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  async put<E extends EntityType>(
    tenantId: string,
    key: StoreKey<E>,
    value: EntityValue<E>,
    ttlSeconds?: number,
  ): Promise<void> {
    const composed = composeKey(tenantId, key);
    const text = JSON.stringify(value);
    await this.call("set", composed, () => this.backend.set(composed, text, ttlSeconds));
  }

  /** @throws PipelineError NotFound when the key is absent or expired. */
  async get<E extends EntityType>(tenantId: string, key: StoreKey<E>): Promise<EntityValue<E>> {
    const value = await this.find(tenantId, key);
    if (value === null) {
      throw new PipelineError("NotFound", `${key.entity} not found: ${key.id}`);
    }
    return value;
  }

  async find<E extends EntityType>(tenantId: string, key: StoreKey<E>): Promise<EntityValue<E> | null> {
    const composed = composeKey(tenantId, key);
    const raw = await this.call("get", composed, () => this.backend.get(composed));
    if (raw === null) return null;
    return this.decode(key.entity, composed, raw);
  }

  async delete(tenantId: string, key: StoreKey): Promise<void> {
    const composed = composeKey(tenantId, key);
    await this.call("del", composed, () => this.backend.del(composed));
  }

  /**
   * Lazily yields every entry under the tenant's prefix for `entity`. The key
   * set is snapshotted when iteration starts; keys deleted or expired since
   * are skipped. Call again to restart.
   */
  async *scanPrefix<E extends EntityType>(
    tenantId: string,
    entity: E,
    documentType?: DocumentType,
  ): AsyncGenerator<StoredEntry<E>> {
    const prefix = composePrefix(tenantId, entity, documentType);
    const keys = await this.call("keys", prefix, () => this.backend.keys(prefix));
    keys.sort();

    for (const key of keys) {
      const raw = await this.call("get", key, () => this.backend.get(key));
      if (raw === null) continue;
      yield { key, value: this.decode(entity, key, raw) };
    }
  }

  private decode<E extends EntityType>(entity: E, key: string, raw: string): EntityValue<E> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new PipelineError("Internal", `Stored value at ${key} is not valid JSON`, { cause: err });
    }
    const schema = ENTITY_SCHEMAS[entity];
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new PipelineError("Internal", `Stored value at ${key} does not match the ${entity} schema`, {
        cause: result.error,
      });
    }
    return result.data;
  }

  /**
   * Runs one backend call. Any failure becomes StorageUnavailable and is
   * retried with exponential backoff before it propagates.
   */
  private call<T>(op: string, key: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          if (hasErrorKind(err, "StorageUnavailable")) throw err;
          throw new PipelineError("StorageUnavailable", `Storage ${op} failed for ${key}: ${errorMessage(err)}`, {
            cause: err,
          });
        }
      },
      {
        attempts: this.retry.attempts,
        baseDelayMs: this.retry.baseDelayMs,
        shouldRetry: (err) => hasErrorKind(err, "StorageUnavailable"),
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn(`Retrying storage ${op}`, { key, attempt, delayMs, error: errorMessage(err) });
        },
        sleep: this.sleep,
      },
    );
  }
}
