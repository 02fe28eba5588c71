import path from "node:path";
import fs from "node:fs";
import { mkdir, readFile, rename, rm, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch } from "undici";
import { z } from "zod";
import { logger } from "../../logger.js";
import { PipelineError, errorMessage } from "../../errors.js";
import { WHISPER_CPP_MODEL_FILES, type WhisperModel } from "../../constants.js";
import type { CommandRunner } from "../../utils/process.js";
import type { AudioChunk, ChunkRequest, EngineSegment, SpeechEngine } from "./types.js";

const log = logger.child({ module: "whisper-cpp" });

export interface WhisperCppOptions {
  run: CommandRunner;
  whisperCmd: string;
  modelsDir: string;
  modelBaseUrl: string;
  timeoutMs: number;
}

// whisper.cpp -oj output; offsets are milliseconds
const WhisperCppJsonSchema = z.object({
  result: z.object({ language: z.string().optional() }).optional(),
  transcription: z.array(
    z.object({
      offsets: z.object({ from: z.number(), to: z.number() }),
      text: z.string(),
    })
  ),
});

export class WhisperCppEngine implements SpeechEngine {
  readonly name = "whisper-cpp";

  constructor(private readonly opts: WhisperCppOptions) {}

  modelPath(model: WhisperModel): string {
    return path.join(this.opts.modelsDir, WHISPER_CPP_MODEL_FILES[model]);
  }

  /** Reuses cached weights; the first use of a model downloads them. */
  async loadModel(model: WhisperModel, signal?: AbortSignal): Promise<void> {
    const modelPath = this.modelPath(model);
    if (await isNonEmptyFile(modelPath)) {
      log.debug({ modelPath }, "Using cached model");
      return;
    }
    await this.downloadModel(model, modelPath, signal);
  }

  async transcribeChunk(chunk: AudioChunk, request: ChunkRequest): Promise<EngineSegment[]> {
    const outPrefix = await request.workspace.file(`whisper_chunk_${chunk.index}`);
    const jsonPath = `${outPrefix}.json`;

    const args = [
      "-m", this.modelPath(request.model),
      "-f", chunk.path,
      "-l", request.language,
      "-of", outPrefix,
      "-oj",
      "-np",
    ];

    try {
      await this.opts.run(this.opts.whisperCmd, args, { timeoutMs: this.opts.timeoutMs });
    } catch (error) {
      throw new PipelineError("InferenceFailed", `whisper.cpp failed on chunk ${chunk.index + 1}`, {
        cause: error,
        hint: `check that ${this.opts.whisperCmd} is installed`,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(jsonPath, "utf-8"));
    } catch (error) {
      throw new PipelineError("InferenceFailed", `Whisper output JSON not found at ${jsonPath}`, {
        cause: error,
      });
    } finally {
      await request.workspace.remove(jsonPath);
    }

    const parsed = WhisperCppJsonSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PipelineError("InferenceFailed", "Unexpected whisper.cpp output format", {
        cause: parsed.error,
      });
    }

    return parsed.data.transcription.map((seg) => ({
      start: seg.offsets.from / 1000,
      end: seg.offsets.to / 1000,
      text: seg.text.trim(),
    }));
  }

  private async downloadModel(model: WhisperModel, modelPath: string, signal?: AbortSignal) {
    const url = `${this.opts.modelBaseUrl}/${WHISPER_CPP_MODEL_FILES[model]}`;
    const partialPath = `${modelPath}.download`;
    log.info({ model, url }, "Downloading model weights");

    try {
      await mkdir(path.dirname(modelPath), { recursive: true });
      const res = await fetch(url, { signal });
      if (!res.ok || !res.body) {
        throw new Error(`HTTP ${res.status} for ${url}`);
      }
      await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(partialPath));
      // Only a complete download ever appears under the cache name
      await rename(partialPath, modelPath);
    } catch (error) {
      await rm(partialPath, { force: true });
      throw new PipelineError("ModelLoadFailed", `Could not download model "${model}": ${errorMessage(error)}`, {
        cause: error,
        hint: `check your network connection and the model cache at ${this.opts.modelsDir}`,
      });
    }
    log.info({ modelPath }, "Model cached");
  }
}

async function isNonEmptyFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile() && info.size > 0;
  } catch {
    return false;
  }
}
