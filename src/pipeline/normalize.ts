import path from "node:path";
import { stat } from "node:fs/promises";
import { logger } from "../logger.js";
import { PipelineError, cancelledError, errorMessage } from "../errors.js";
import {
  SUPPORTED_AUDIO,
  SUPPORTED_VIDEO,
  TARGET_CHANNELS,
  TARGET_SAMPLE_RATE,
} from "../constants.js";
import type { MediaKind, NormalizedAudio } from "../types.js";
import { CommandError, type CommandRunner } from "../utils/process.js";
import type { RunWorkspace } from "../utils/workspace.js";
import { probeMedia, type MediaProbe } from "./probe.js";

const log = logger.child({ module: "normalize" });

export interface NormalizerOptions {
  run: CommandRunner;
  ffmpegCmd: string;
  ffprobeCmd: string;
  extractionTimeoutMs: number;
  compressAboveBytes: number; // 0 disables re-encoding of passthrough audio
  extractionAttempts?: number;
}

export interface NormalizeContext {
  workspace: RunWorkspace;
  signal?: AbortSignal;
}

export function classifyMedia(filePath: string): MediaKind | null {
  const ext = path.extname(filePath).toLowerCase();
  if (SUPPORTED_AUDIO.some((e) => e === ext)) return "audio";
  if (SUPPORTED_VIDEO.some((e) => e === ext)) return "video";
  return null;
}

/**
 * Makes sure the rest of the pipeline always sees a decodable audio stream.
 * Audio passes through untouched; video (and oversized audio) is decoded by
 * ffmpeg into a 16 kHz mono WAV inside the run workspace.
 */
export class MediaNormalizer {
  private readonly attempts: number;

  constructor(private readonly opts: NormalizerOptions) {
    this.attempts = Math.max(1, opts.extractionAttempts ?? 2);
  }

  async normalize(inputPath: string, ctx: NormalizeContext): Promise<NormalizedAudio> {
    const kind = classifyMedia(inputPath);
    if (!kind) {
      throw new PipelineError(
        "UnsupportedFormat",
        `Unsupported file type "${path.extname(inputPath) || path.basename(inputPath)}"`,
        { hint: `supported: ${[...SUPPORTED_AUDIO, ...SUPPORTED_VIDEO].join(" ")}` }
      );
    }

    let sizeBytes: number;
    try {
      const info = await stat(inputPath);
      if (!info.isFile()) {
        throw new Error("not a regular file");
      }
      sizeBytes = info.size;
    } catch (error) {
      throw new PipelineError("UnsupportedFormat", `Input file not found: ${inputPath}`, {
        cause: error,
      });
    }

    this.throwIfAborted(ctx.signal);

    if (kind === "video") {
      log.info({ inputPath }, "Video detected, extracting audio");
      return this.extract(inputPath, "video", ctx);
    }

    const { compressAboveBytes } = this.opts;
    if (compressAboveBytes > 0 && sizeBytes >= compressAboveBytes) {
      log.info(
        { inputPath, sizeMb: Math.round(sizeBytes / (1024 * 1024)) },
        "Large audio file, re-encoding"
      );
      return this.extract(inputPath, "audio", ctx);
    }

    return this.passthrough(inputPath, ctx.signal);
  }

  private async passthrough(inputPath: string, signal?: AbortSignal): Promise<NormalizedAudio> {
    let probe: MediaProbe;
    try {
      probe = await probeMedia(this.opts.run, this.opts.ffprobeCmd, inputPath, signal);
    } catch (error) {
      this.throwIfAborted(signal);
      throw new PipelineError("UnsupportedFormat", `Could not read audio from ${inputPath}`, {
        cause: error,
      });
    }
    if (!probe.hasAudio) {
      throw new PipelineError("UnsupportedFormat", `No audio stream in ${inputPath}`);
    }
    return {
      path: inputPath,
      durationSeconds: probe.durationSeconds,
      sampleRate: probe.sampleRate ?? TARGET_SAMPLE_RATE,
      temporary: false,
      sourceKind: "audio",
    };
  }

  private async extract(
    inputPath: string,
    sourceKind: MediaKind,
    ctx: NormalizeContext
  ): Promise<NormalizedAudio> {
    const outputPath = await ctx.workspace.file(`${path.parse(inputPath).name}.wav`);
    const args = [
      "-y",
      "-v",
      "error",
      "-i",
      inputPath,
      "-vn",
      "-acodec",
      "pcm_s16le",
      "-ar",
      String(TARGET_SAMPLE_RATE),
      "-ac",
      String(TARGET_CHANNELS),
      outputPath,
    ];

    for (let attempt = 1; ; attempt++) {
      try {
        await this.opts.run(this.opts.ffmpegCmd, args, {
          timeoutMs: this.opts.extractionTimeoutMs,
          signal: ctx.signal,
        });
        break;
      } catch (error) {
        this.throwIfAborted(ctx.signal);
        const detail = error instanceof CommandError && error.timedOut ? "timed out" : "failed";
        if (attempt < this.attempts) {
          log.warn({ err: error, attempt }, `ffmpeg extraction ${detail}, retrying`);
          continue;
        }
        throw new PipelineError(
          "ExtractionFailed",
          `ffmpeg audio extraction ${detail} for ${path.basename(inputPath)}`,
          { cause: error, hint: "check that ffmpeg is installed and the file is not damaged" }
        );
      }
    }

    let probe: MediaProbe;
    try {
      probe = await probeMedia(this.opts.run, this.opts.ffprobeCmd, outputPath, ctx.signal);
    } catch (error) {
      this.throwIfAborted(ctx.signal);
      throw new PipelineError("ExtractionFailed", `Could not probe extracted audio: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    log.info({ outputPath, durationSeconds: probe.durationSeconds }, "Audio extracted");
    return {
      path: outputPath,
      durationSeconds: probe.durationSeconds,
      sampleRate: TARGET_SAMPLE_RATE,
      temporary: true,
      sourceKind,
    };
  }

  private throwIfAborted(signal?: AbortSignal) {
    if (signal?.aborted) {
      throw cancelledError("normalizing");
    }
  }
}
