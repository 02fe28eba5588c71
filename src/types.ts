import type { DocumentFormat, LanguageCode } from "./constants.js";

export interface TranscriptionRequest {
  readonly inputPath: string;
  readonly languageCode: LanguageCode;
  readonly modelName: string; // validated by the engine adapter, not here
}

export type MediaKind = "audio" | "video";

export interface NormalizedAudio {
  path: string;
  durationSeconds: number;
  sampleRate: number;
  temporary: boolean; // true when path lives in the run workspace
  sourceKind: MediaKind;
}

export interface TranscriptSegment {
  readonly startSeconds: number;
  readonly endSeconds: number;
  readonly text: string;
  readonly confidence?: number;
}

export interface TranscriptionProgress {
  fractionComplete: number;
  currentSegmentEndSeconds: number;
}

export type ProgressListener = (progress: TranscriptionProgress) => void;

export interface OutputDocument {
  path: string;
  format: DocumentFormat;
  segmentsRendered: readonly TranscriptSegment[];
}

export type SessionState =
  | "idle"
  | "normalizing"
  | "transcribing"
  | "assembling"
  | "done"
  | "failed"
  | "cancelled";

export type PipelineStage = "normalizing" | "transcribing" | "assembling";

export function createTranscriptionRequest(input: {
  inputPath: string;
  languageCode: LanguageCode;
  modelName: string;
}): TranscriptionRequest {
  return Object.freeze({
    inputPath: input.inputPath,
    languageCode: input.languageCode,
    modelName: input.modelName,
  });
}
