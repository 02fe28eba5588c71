import type { LanguageCode, WhisperModel } from "../../constants.js";
import type { RunWorkspace } from "../../utils/workspace.js";

export interface AudioChunk {
  index: number;
  path: string; // 16 kHz mono WAV
  startSeconds: number;
  endSeconds: number;
}

// Times are relative to the start of the chunk
export interface EngineSegment {
  start: number;
  end: number;
  text: string;
  confidence?: number;
}

export interface ChunkRequest {
  language: LanguageCode;
  model: WhisperModel;
  workspace: RunWorkspace;
}

/**
 * A speech recognizer the adapter can drive one chunk at a time.
 * Implementations throw PipelineError with ModelLoadFailed or InferenceFailed.
 */
export interface SpeechEngine {
  readonly name: string;
  loadModel(model: WhisperModel, signal?: AbortSignal): Promise<void>;
  transcribeChunk(chunk: AudioChunk, request: ChunkRequest): Promise<EngineSegment[]>;
}
