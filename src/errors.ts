import type { PipelineStage } from "./types.js";

export type PipelineErrorKind =
  | "UnsupportedFormat"
  | "ExtractionFailed"
  | "ModelLoadFailed"
  | "InferenceFailed"
  | "WriteFailed"
  | "Cancelled";

export interface PipelineErrorOptions {
  hint?: string;
  cause?: unknown;
  stage?: PipelineStage;
}

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;
  readonly hint?: string;
  // Filled in by the session when the error crosses a stage boundary
  stage?: PipelineStage;

  constructor(kind: PipelineErrorKind, message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "PipelineError";
    this.kind = kind;
    this.hint = options.hint;
    this.stage = options.stage;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function cancelledError(stage?: PipelineStage): PipelineError {
  return new PipelineError("Cancelled", "Cancelled by user", { stage });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Single-line diagnostic for the terminal, e.g.
 * `[transcribing] ModelLoadFailed: Unknown model "giant-v9" (choose one of: tiny, base)`
 */
export function describeFailure(err: PipelineError): string {
  const stage = err.stage ? `[${err.stage}] ` : "";
  const hint = err.hint ? ` (${err.hint})` : "";
  return `${stage}${err.kind}: ${err.message}${hint}`;
}

export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  usage: 2,
  cancelled: 130,
} as const;

export function exitCodeFor(err: PipelineError): number {
  return err.kind === "Cancelled" ? EXIT_CODES.cancelled : EXIT_CODES.failed;
}
