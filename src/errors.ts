// Pitch Scoring Pipeline - Error taxonomy
// Every public operation fails with exactly one of these kinds plus a
// human-readable reason. Stack traces stay in the logs.

export type ErrorKind =
  | "InvalidTransition"
  | "NotFound"
  | "StorageUnavailable"
  | "AlreadyScoring"
  | "AnalysisCapabilityError"
  | "IndexEmpty"
  | "InvalidInput"
  | "Cancelled"
  | "Internal";

export interface PublicError {
  kind: ErrorKind;
  reason: string;
}

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly reason: string;

  constructor(kind: ErrorKind, reason: string, options?: { cause?: unknown }) {
    super(`${kind}: ${reason}`, options);
    this.name = "PipelineError";
    this.kind = kind;
    this.reason = reason;
  }

  toPublic(): PublicError {
    return { kind: this.kind, reason: this.reason };
  }
}

/** Stage at which an analysis capability call went wrong. */
export type AnalysisFailureStage = "provider" | "empty_response" | "parse" | "validation";

/**
 * Raised by the analysis gateway. Captured by the scoring fallback chain;
 * it only escapes when every tier fails.
 */
export class AnalysisCapabilityError extends PipelineError {
  readonly stage: AnalysisFailureStage;

  constructor(stage: AnalysisFailureStage, reason: string, options?: { cause?: unknown }) {
    super("AnalysisCapabilityError", `[${stage}] ${reason}`, options);
    this.name = "AnalysisCapabilityError";
    this.stage = stage;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function hasErrorKind(err: unknown, kind: ErrorKind): boolean {
  return err instanceof PipelineError && err.kind === kind;
}

/** Message text of any thrown value, for logs only. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Maps any thrown value onto the public taxonomy. Unknown failures collapse
 * to Internal so no internal exception text leaves the process.
 */
export function toPublicError(err: unknown): PublicError {
  if (err instanceof PipelineError) {
    return err.toPublic();
  }
  return { kind: "Internal", reason: "Internal error" };
}
