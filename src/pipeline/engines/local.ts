import path from "node:path";
import { readFile } from "node:fs/promises";
import { Blob } from "node:buffer";
import { fetch, FormData } from "undici";
import { z } from "zod";
import { logger } from "../../logger.js";
import { PipelineError, errorMessage } from "../../errors.js";
import type { WhisperModel } from "../../constants.js";
import type { AudioChunk, ChunkRequest, EngineSegment, SpeechEngine } from "./types.js";

const log = logger.child({ module: "local-asr" });

export interface LocalAsrOptions {
  baseUrl: string; // e.g., http://localhost:5689
  timeoutMs: number;
}

// OpenAI-compatible verbose_json
const VerboseJsonSchema = z.object({
  text: z.string().optional(),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().optional(),
        end: z.number().optional(),
        text: z.string().optional(),
        avg_logprob: z.number().optional(),
      })
    )
    .default([]),
});

/**
 * Talks to a local ASR service exposing the OpenAI transcription API.
 * The service owns its own model cache; we only pick the model per request.
 */
export class LocalAsrEngine implements SpeechEngine {
  readonly name = "local";

  constructor(private readonly opts: LocalAsrOptions) {}

  async loadModel(model: WhisperModel, signal?: AbortSignal): Promise<void> {
    try {
      const healthCheck = await fetch(`${this.opts.baseUrl}/healthz`, { signal });
      if (!healthCheck.ok) {
        throw new Error(`Local ASR service health check failed: ${healthCheck.status}`);
      }
    } catch (error) {
      throw new PipelineError(
        "ModelLoadFailed",
        `Local ASR service is not available at ${this.opts.baseUrl}: ${errorMessage(error)}`,
        { cause: error, hint: "ensure the ASR service is running and reachable" }
      );
    }
    log.debug({ model, baseUrl: this.opts.baseUrl }, "Local ASR service ready");
  }

  async transcribeChunk(chunk: AudioChunk, request: ChunkRequest): Promise<EngineSegment[]> {
    const form = new FormData();
    const audioBuffer = await readFile(chunk.path);
    form.append("file", new Blob([audioBuffer], { type: "audio/wav" }), path.basename(chunk.path));
    form.append("model", request.model);
    form.append("task", "transcribe");
    form.append("language", request.language);
    form.append("response_format", "verbose_json");

    let raw: unknown;
    try {
      const response = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
        method: "POST",
        body: form,
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Local ASR transcription failed: ${response.status} ${errorText}`);
      }
      raw = await response.json();
    } catch (error) {
      throw new PipelineError("InferenceFailed", `Chunk ${chunk.index + 1}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = VerboseJsonSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError("InferenceFailed", "Unexpected response from local ASR service", {
        cause: parsed.error,
      });
    }

    return parsed.data.segments.map((s) => ({
      start: s.start ?? 0,
      end: s.end ?? s.start ?? 0,
      text: (s.text ?? "").trim(),
      confidence: s.avg_logprob === undefined ? undefined : Math.exp(s.avg_logprob),
    }));
  }
}
