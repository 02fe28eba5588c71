import path from "node:path";
import { logger } from "../logger.js";
import { PipelineError, cancelledError, isPipelineError } from "../errors.js";
import {
  TARGET_CHANNELS,
  TARGET_SAMPLE_RATE,
  VALID_WHISPER_MODELS,
  isValidModel,
  type LanguageCode,
} from "../constants.js";
import type { NormalizedAudio, ProgressListener, TranscriptSegment } from "../types.js";
import type { CommandRunner } from "../utils/process.js";
import type { RunWorkspace } from "../utils/workspace.js";
import type { AudioChunk, EngineSegment, SpeechEngine } from "./engines/types.js";

const log = logger.child({ module: "transcribe" });

// Non-final progress stays strictly below completion
const MAX_PARTIAL_FRACTION = 0.999;

export interface AdapterOptions {
  engine: SpeechEngine;
  run: CommandRunner;
  ffmpegCmd: string;
  chunkSeconds: number; // 0 transcribes the whole file as one chunk
  overlapSeconds: number;
}

export interface TranscribeContext {
  workspace: RunWorkspace;
  signal?: AbortSignal;
}

export interface ChunkWindow {
  startSeconds: number;
  endSeconds: number;
}

export function planChunks(
  durationSeconds: number,
  chunkSeconds: number,
  overlapSeconds = 0
): ChunkWindow[] {
  const total = Number.isFinite(durationSeconds) ? Math.max(0, durationSeconds) : 0;
  if (chunkSeconds <= 0 || total <= chunkSeconds) {
    return [{ startSeconds: 0, endSeconds: total }];
  }
  const overlap = overlapSeconds > 0 && overlapSeconds < chunkSeconds ? overlapSeconds : 0;
  const step = chunkSeconds - overlap;

  const windows: ChunkWindow[] = [];
  for (let start = 0; ; start += step) {
    const end = Math.min(start + chunkSeconds, total);
    windows.push({ startSeconds: start, endSeconds: end });
    if (end >= total) break;
  }
  return windows;
}

function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[\p{P}\p{S}]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Puts segments into strictly increasing start order without overlaps.
 * Blank segments are dropped, equal starts are merged, and an end that runs
 * past the next start is clamped to it.
 */
export function resequenceSegments(segments: readonly TranscriptSegment[]): TranscriptSegment[] {
  const sorted = segments
    .map((s) => ({ ...s, text: s.text.trim() }))
    .filter((s) => s.text.length > 0)
    .sort((a, b) => a.startSeconds - b.startSeconds);

  const out: TranscriptSegment[] = [];
  for (const seg of sorted) {
    const current: TranscriptSegment = {
      ...seg,
      endSeconds: Math.max(seg.startSeconds, seg.endSeconds),
    };
    const prev = out[out.length - 1];
    if (!prev) {
      out.push(current);
      continue;
    }
    if (current.startSeconds <= prev.startSeconds) {
      out[out.length - 1] = {
        startSeconds: prev.startSeconds,
        endSeconds: Math.max(prev.endSeconds, current.endSeconds),
        text: `${prev.text} ${current.text}`,
        confidence:
          prev.confidence !== undefined && current.confidence !== undefined
            ? Math.min(prev.confidence, current.confidence)
            : undefined,
      };
      continue;
    }
    if (prev.endSeconds > current.startSeconds) {
      out[out.length - 1] = { ...prev, endSeconds: current.startSeconds };
    }
    out.push(current);
  }
  return out;
}

/**
 * Drives a speech engine over the normalized audio one window at a time,
 * reporting progress after each window and honoring cancellation between them.
 */
export class TranscriptionEngineAdapter {
  constructor(private readonly opts: AdapterOptions) {}

  async transcribe(
    audio: NormalizedAudio,
    languageCode: LanguageCode,
    modelName: string,
    onProgress: ProgressListener,
    ctx: TranscribeContext
  ): Promise<TranscriptSegment[]> {
    const { engine } = this.opts;
    if (!isValidModel(modelName)) {
      throw new PipelineError("ModelLoadFailed", `Unknown model "${modelName}"`, {
        hint: `choose one of: ${VALID_WHISPER_MODELS.join(", ")}`,
      });
    }

    this.throwIfAborted(ctx.signal);
    try {
      await engine.loadModel(modelName, ctx.signal);
    } catch (error) {
      this.throwIfAborted(ctx.signal);
      if (isPipelineError(error)) throw error;
      throw new PipelineError("ModelLoadFailed", `Could not load model "${modelName}"`, {
        cause: error,
        hint: "check your network connection and the model cache",
      });
    }
    this.throwIfAborted(ctx.signal);

    const total = audio.durationSeconds;
    const windows = planChunks(total, this.opts.chunkSeconds, this.opts.overlapSeconds);
    log.info(
      { engine: engine.name, model: modelName, language: languageCode, chunks: windows.length },
      "Starting transcription"
    );

    let lastFraction = 0;
    const emit = (fraction: number, segmentEnd: number) => {
      lastFraction = Math.max(lastFraction, fraction);
      onProgress({ fractionComplete: lastFraction, currentSegmentEndSeconds: segmentEnd });
    };
    emit(0, 0);

    const collected: TranscriptSegment[] = [];
    for (let index = 0; index < windows.length; index++) {
      this.throwIfAborted(ctx.signal);
      const span = windows[index];
      const isLast = index === windows.length - 1;

      const chunk = await this.prepareChunk(audio, span, index, windows.length === 1, ctx);
      let raw: EngineSegment[];
      try {
        raw = await engine.transcribeChunk(chunk, {
          language: languageCode,
          model: modelName,
          workspace: ctx.workspace,
        });
      } catch (error) {
        // Ctrl-C also kills the engine's child process
        this.throwIfAborted(ctx.signal);
        if (isPipelineError(error)) throw error;
        throw new PipelineError("InferenceFailed", `Transcription of chunk ${index + 1} failed`, {
          cause: error,
        });
      } finally {
        if (chunk.path !== audio.path) {
          await ctx.workspace.remove(chunk.path);
        }
      }

      // The in-flight chunk has finished; stop before anything else is reported
      this.throwIfAborted(ctx.signal);

      mergeChunk(collected, raw, span.startSeconds);
      const segmentEnd = collected.length ? collected[collected.length - 1].endSeconds : 0;
      if (isLast) {
        emit(1, segmentEnd);
      } else {
        const fraction = total > 0 ? span.endSeconds / total : 0;
        emit(Math.min(fraction, MAX_PARTIAL_FRACTION), segmentEnd);
      }
      log.debug({ chunk: index + 1, of: windows.length, segments: raw.length }, "Chunk transcribed");
    }

    const segments = resequenceSegments(collected);
    log.info({ segments: segments.length }, "Transcription complete");
    return segments;
  }

  private async prepareChunk(
    audio: NormalizedAudio,
    span: ChunkWindow,
    index: number,
    single: boolean,
    ctx: TranscribeContext
  ): Promise<AudioChunk> {
    const isTargetWav =
      path.extname(audio.path).toLowerCase() === ".wav" && audio.sampleRate === TARGET_SAMPLE_RATE;
    if (single && isTargetWav) {
      return { index, path: audio.path, ...span };
    }

    const chunkPath = await ctx.workspace.file(`chunk_${String(index).padStart(3, "0")}.wav`);
    const length = span.endSeconds - span.startSeconds;
    const args = ["-y", "-v", "error"];
    if (!single && length > 0) {
      args.push("-ss", String(span.startSeconds), "-t", String(length));
    }
    args.push(
      "-i", audio.path,
      "-vn",
      "-ac", String(TARGET_CHANNELS),
      "-ar", String(TARGET_SAMPLE_RATE),
      "-c:a", "pcm_s16le",
      chunkPath
    );

    try {
      await this.opts.run(this.opts.ffmpegCmd, args, { signal: ctx.signal });
    } catch (error) {
      this.throwIfAborted(ctx.signal);
      throw new PipelineError("InferenceFailed", `Could not cut audio chunk ${index + 1}`, {
        cause: error,
      });
    }
    return { index, path: chunkPath, ...span };
  }

  private throwIfAborted(signal?: AbortSignal) {
    if (signal?.aborted) {
      throw cancelledError("transcribing");
    }
  }
}

// Shifts chunk-relative times and drops text repeated inside an overlap
function mergeChunk(into: TranscriptSegment[], raw: EngineSegment[], offsetSeconds: number) {
  for (const seg of raw) {
    const adjusted: TranscriptSegment = {
      startSeconds: seg.start + offsetSeconds,
      endSeconds: seg.end + offsetSeconds,
      text: seg.text,
      ...(seg.confidence !== undefined ? { confidence: seg.confidence } : {}),
    };
    const last = into[into.length - 1];
    const isOverlapping = last !== undefined && adjusted.startSeconds < last.endSeconds;
    if (isOverlapping && normalizeText(last.text) === normalizeText(adjusted.text)) {
      continue;
    }
    into.push(adjusted);
  }
}
