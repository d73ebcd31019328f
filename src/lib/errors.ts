/**
 * Error taxonomy shared by the retrieval and conversation services.
 *
 * Every error carries a stable `code` so the HTTP layer can map it to a
 * status without inspecting messages, and an optional `stage` naming the
 * pipeline step that failed.
 */

export type ErrorCode =
  | "VALIDATION"
  | "PROVIDER_UNAVAILABLE"
  | "NOT_FOUND"
  | "INTERNAL";

export class RagError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly stage?: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RagError";
  }
}

/** Bad weights, thresholds or request fields. Rejected before any work starts. */
export class ValidationError extends RagError {
  constructor(message: string, public readonly field?: string) {
    super(message, "VALIDATION", "validation");
    this.name = "ValidationError";
  }
}

/** Embedding, index or generation backend failed or timed out. */
export class ProviderUnavailableError extends RagError {
  constructor(
    message: string,
    public readonly provider: string,
    cause?: unknown,
    stage?: string
  ) {
    super(message, "PROVIDER_UNAVAILABLE", stage, cause);
    this.name = "ProviderUnavailableError";
  }
}

export class TimeoutError extends ProviderUnavailableError {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, label, undefined, label);
    this.name = "TimeoutError";
  }
}

export class NotFoundError extends RagError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class InternalError extends RagError {
  constructor(message: string, stage?: string, cause?: unknown) {
    super(message, "INTERNAL", stage, cause);
    this.name = "InternalError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function httpStatusFor(error: unknown): number {
  if (!(error instanceof RagError)) return 500;
  switch (error.code) {
    case "VALIDATION":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "PROVIDER_UNAVAILABLE":
      return 503;
    default:
      return 500;
  }
}
