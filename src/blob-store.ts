// Pitch Scoring Pipeline - Blob Store Gateway
// Tenant-scoped storage for recorded audio plus time-limited signed URLs.
// Signatures are HMAC-SHA256 over "tenant:blob:type:expires". Transient file
// system faults are retried with exponential backoff before they surface as
// StorageUnavailable.

import { createHmac, timingSafeEqual } from "node:crypto";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { PipelineError, errorMessage, hasErrorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { withRetry } from "./retry.js";
import type { BlobHandle, SignedBlobUrl } from "./types.js";

export interface BlobStore {
  put(tenantId: string, bytes: Buffer, contentType: string): Promise<BlobHandle>;
  /** @throws PipelineError NotFound for a missing blob or a handle from another tenant. */
  read(tenantId: string, handle: BlobHandle): Promise<Buffer>;
  exists(tenantId: string, handle: BlobHandle): Promise<boolean>;
  sign(handle: BlobHandle, ttlSeconds: number): SignedBlobUrl;
  /** Returns the handle a signed URL grants access to, or null if invalid or expired. */
  verify(url: string): BlobHandle | null;
}

/** The file operations the store needs; tests substitute a failing one. */
export interface BlobFileSystem {
  ensureDir(path: string): Promise<void>;
  writeFile(path: string, data: Buffer): Promise<void>;
  readFile(path: string): Promise<Buffer>;
  stat(path: string): Promise<unknown>;
}

export const nodeFileSystem: BlobFileSystem = {
  ensureDir: async (path) => {
    await mkdir(path, { recursive: true });
  },
  writeFile: (path, data) => writeFile(path, data),
  readFile: (path) => readFile(path),
  stat: (path) => stat(path),
};

export interface FileBlobStoreOptions {
  baseDir: string;
  signingSecret: string;
  /** Origin and path prefix used when building signed URLs. */
  publicBaseUrl?: string;
  fs?: BlobFileSystem;
  retry?: { attempts: number; baseDelayMs: number };
  logger?: Logger;
  /** Replaces the backoff sleep in tests. */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const BLOB_ID_PATTERN = /^[0-9a-f-]{36}$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileBlobStore implements BlobStore {
  private readonly baseDir: string;
  private readonly secret: string;
  private readonly publicBaseUrl: string;
  private readonly fs: BlobFileSystem;
  private readonly retry: { attempts: number; baseDelayMs: number };
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: FileBlobStoreOptions) {
    if (options.signingSecret.length === 0) {
      throw new Error("FileBlobStore requires a signing secret");
    }
    this.baseDir = options.baseDir;
    this.secret = options.signingSecret;
    this.publicBaseUrl = options.publicBaseUrl ?? "http://localhost:3000/blobs";
    this.fs = options.fs ?? nodeFileSystem;
    this.retry = options.retry ?? { attempts: 3, baseDelayMs: 50 };
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
  }

  async put(tenantId: string, bytes: Buffer, contentType: string): Promise<BlobHandle> {
    assertTenant(tenantId);
    const blobId = uuidv4();
    const dir = join(this.baseDir, tenantId);
    await this.call("write", blobId, async () => {
      await this.fs.ensureDir(dir);
      await this.fs.writeFile(join(dir, `${blobId}.bin`), bytes);
    });
    return {
      tenantId,
      blobId,
      contentType,
      size: bytes.length,
      createdAt: new Date(this.now()).toISOString(),
    };
  }

  async read(tenantId: string, handle: BlobHandle): Promise<Buffer> {
    const path = this.pathFor(tenantId, handle);
    const bytes = await this.call("read", handle.blobId, async () => {
      try {
        return await this.fs.readFile(path);
      } catch (err) {
        if (isMissingFile(err)) return null;
        throw err;
      }
    });
    if (bytes === null) {
      throw new PipelineError("NotFound", `Blob not found: ${handle.blobId}`);
    }
    return bytes;
  }

  async exists(tenantId: string, handle: BlobHandle): Promise<boolean> {
    assertTenant(tenantId);
    if (handle.tenantId !== tenantId || !BLOB_ID_PATTERN.test(handle.blobId)) {
      return false;
    }
    const path = join(this.baseDir, tenantId, `${handle.blobId}.bin`);
    return this.call("stat", handle.blobId, async () => {
      try {
        await this.fs.stat(path);
        return true;
      } catch (err) {
        if (isMissingFile(err)) return false;
        throw err;
      }
    });
  }

  sign(handle: BlobHandle, ttlSeconds: number): SignedBlobUrl {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new PipelineError("InvalidInput", "ttlSeconds must be a positive number");
    }
    const expires = Math.floor(this.now() / 1000) + Math.floor(ttlSeconds);
    const signature = this.signature(handle.tenantId, handle.blobId, handle.contentType, expires);
    const params = new URLSearchParams({
      tenant: handle.tenantId,
      blob: handle.blobId,
      type: handle.contentType,
      size: String(handle.size),
      created: handle.createdAt,
      expires: String(expires),
      signature,
    });
    return {
      url: `${this.publicBaseUrl}?${params.toString()}`,
      expiresAt: new Date(expires * 1000).toISOString(),
    };
  }

  verify(url: string): BlobHandle | null {
    let params: URLSearchParams;
    try {
      params = new URL(url).searchParams;
    } catch {
      return null;
    }
    const tenantId = params.get("tenant");
    const blobId = params.get("blob");
    const contentType = params.get("type");
    const expiresText = params.get("expires");
    const signature = params.get("signature");
    if (!tenantId || !blobId || !contentType || !expiresText || !signature) return null;

    const expires = Number(expiresText);
    if (!Number.isInteger(expires) || expires * 1000 <= this.now()) return null;

    const expected = Buffer.from(this.signature(tenantId, blobId, contentType, expires), "hex");
    const given = Buffer.from(signature, "hex");
    if (expected.length !== given.length || !timingSafeEqual(expected, given)) return null;

    return {
      tenantId,
      blobId,
      contentType,
      size: Number(params.get("size") ?? "0"),
      createdAt: params.get("created") ?? "",
    };
  }

  private signature(tenantId: string, blobId: string, contentType: string, expires: number): string {
    return createHmac("sha256", this.secret)
      .update(`${tenantId}:${blobId}:${contentType}:${expires}`)
      .digest("hex");
  }

  /** Runs one file operation, retrying faults other than NotFound. */
  private call<T>(op: string, blobId: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          if (hasErrorKind(err, "StorageUnavailable")) throw err;
          throw new PipelineError("StorageUnavailable", `Blob ${op} failed: ${errorMessage(err)}`, { cause: err });
        }
      },
      {
        attempts: this.retry.attempts,
        baseDelayMs: this.retry.baseDelayMs,
        shouldRetry: (err) => hasErrorKind(err, "StorageUnavailable"),
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn(`Retrying blob ${op}`, { blobId, attempt, delayMs, error: errorMessage(err) });
        },
        sleep: this.sleep,
      },
    );
  }

  private pathFor(tenantId: string, handle: BlobHandle): string {
    assertTenant(tenantId);
    if (handle.tenantId !== tenantId || !BLOB_ID_PATTERN.test(handle.blobId)) {
      throw new PipelineError("NotFound", `Blob not found: ${handle.blobId}`);
    }
    return join(this.baseDir, tenantId, `${handle.blobId}.bin`);
  }
}

function assertTenant(tenantId: string): void {
  if (tenantId.length === 0 || tenantId.startsWith(".") || /[:/\\]/.test(tenantId)) {
    throw new PipelineError("InvalidInput", `Invalid tenantId: ${JSON.stringify(tenantId)}`);
  }
}
